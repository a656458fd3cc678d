import type { RenderJob, RenderJobSpec, RenderStatus, UploadStatus } from "../../domain/entities/render-job";
import type { IJobStore } from "../../domain/interfaces/ijob.store";
import { canTransitionRender, canTransitionUpload, clampProgress } from "../../domain/utils/job-state.machine";

/**
 * Process-local job store. Each method reads and writes the record without awaiting in
 * between, so updates are atomic with respect to other callers on the event loop.
 * Records are copied on the way in and out.
 */
export class InMemoryJobStore implements IJobStore {
  private jobs = new Map<number, RenderJob>();
  private lastId = 0;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private copy(job: RenderJob): RenderJob {
    return {
      ...job,
      tags: [...job.tags],
      log: job.log.map((entry) => ({ ...entry })),
    };
  }

  async create(spec: RenderJobSpec): Promise<number> {
    const id = ++this.lastId;
    const now = this.clock();
    this.jobs.set(id, {
      ...spec,
      tags: [...spec.tags],
      id,
      renderStatus: "pending",
      uploadStatus: "idle",
      progressPercent: 0,
      etaLabel: "",
      log: [],
      createdAt: now,
      updatedAt: now,
    });
    return id;
  }

  async get(id: number): Promise<RenderJob | null> {
    const job = this.jobs.get(id);
    return job ? this.copy(job) : null;
  }

  async listAll(): Promise<RenderJob[]> {
    return [...this.jobs.values()].sort((a, b) => b.id - a.id).map((job) => this.copy(job));
  }

  async listReadyForUpload(): Promise<RenderJob[]> {
    return [...this.jobs.values()]
      .filter((job) => job.renderStatus === "success" && job.uploadStatus === "waiting_schedule")
      .sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime() || a.id - b.id)
      .map((job) => this.copy(job));
  }

  async updateRenderStatus(id: number, status: RenderStatus): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || !canTransitionRender(job.renderStatus, status)) {
      return false;
    }
    job.renderStatus = status;
    job.updatedAt = this.clock();
    return true;
  }

  async updateUploadStatus(id: number, status: UploadStatus): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || !canTransitionUpload(job.uploadStatus, status, job.renderStatus)) {
      return false;
    }
    job.uploadStatus = status;
    job.updatedAt = this.clock();
    return true;
  }

  async setOutputArtifact(id: number, outputArtifact: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.renderStatus !== "rendering" || job.outputArtifact !== undefined) {
      return false;
    }
    job.outputArtifact = outputArtifact;
    job.updatedAt = this.clock();
    return true;
  }

  async setExternalId(id: number, externalId: string): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || job.uploadStatus !== "uploading" || job.externalId !== undefined) {
      return false;
    }
    job.externalId = externalId;
    job.updatedAt = this.clock();
    return true;
  }

  async updateProgress(id: number, percent: number, etaLabel: string): Promise<void> {
    const job = this.jobs.get(id);
    if (!job) return;
    job.progressPercent = clampProgress(percent);
    job.etaLabel = etaLabel;
    job.updatedAt = this.clock();
  }

  async appendLog(id: number, message: string): Promise<void> {
    const job = this.jobs.get(id);
    if (!job) return;
    const now = this.clock();
    job.log.push({ at: now, message });
    job.updatedAt = now;
  }
}
