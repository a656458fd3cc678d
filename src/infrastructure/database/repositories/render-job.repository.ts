import { Db, type WithId } from "mongodb";
import type { RenderJob, RenderJobSpec, RenderStatus, UploadStatus } from "../../../domain/entities/render-job";
import type { IJobStore } from "../../../domain/interfaces/ijob.store";
import { clampProgress, renderSourcesFor, uploadSourcesFor } from "../../../domain/utils/job-state.machine";
import { MongoDBRepository } from "../mongodb.repository";

/**
 * MongoDB-backed job store. Every method is a single-document operation, so each update is
 * atomic; status changes are compare-and-set on the current status.
 */
export class RenderJobRepository extends MongoDBRepository<RenderJob> implements IJobStore {
  constructor(db: Db) {
    super(db, "renderJobs");
    this.ensureAdditionalIndexes().catch((error) => {
      console.log("[RenderJobRepository] Index creation skipped (may already exist):", error);
    });
  }

  private async ensureAdditionalIndexes(): Promise<void> {
    // Scheduler poll: renderStatus=success AND uploadStatus=waiting_schedule
    await this.collection.createIndex({ renderStatus: 1, uploadStatus: 1, scheduledAt: 1 });
  }

  private toDomain(doc: WithId<RenderJob>): RenderJob {
    return {
      id: doc.id,
      videoSource: doc.videoSource,
      audioSource: doc.audioSource,
      targetDurationHours: doc.targetDurationHours,
      watermarkMode: doc.watermarkMode,
      muteOriginal: doc.muteOriginal,
      title: doc.title,
      description: doc.description,
      tags: [...doc.tags],
      scheduledAt: doc.scheduledAt,
      renderStatus: doc.renderStatus,
      uploadStatus: doc.uploadStatus,
      progressPercent: doc.progressPercent,
      etaLabel: doc.etaLabel,
      outputArtifact: doc.outputArtifact ?? undefined,
      externalId: doc.externalId ?? undefined,
      log: doc.log.map((entry) => ({ at: entry.at, message: entry.message })),
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };
  }

  async create(spec: RenderJobSpec): Promise<number> {
    const id = await this.nextId();
    const now = new Date();
    const job: RenderJob = {
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
    };
    await this.collection.insertOne(job);
    return id;
  }

  async get(id: number): Promise<RenderJob | null> {
    const doc = await this.collection.findOne({ id });
    return doc ? this.toDomain(doc) : null;
  }

  async listAll(): Promise<RenderJob[]> {
    const docs = await this.collection.find({}).sort({ id: -1 }).toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async listReadyForUpload(): Promise<RenderJob[]> {
    const docs = await this.collection
      .find({ renderStatus: "success", uploadStatus: "waiting_schedule" })
      .sort({ scheduledAt: 1, id: 1 })
      .toArray();
    return docs.map((doc) => this.toDomain(doc));
  }

  async updateRenderStatus(id: number, status: RenderStatus): Promise<boolean> {
    const result = await this.collection.updateOne(
      { id, renderStatus: { $in: renderSourcesFor(status) } },
      { $set: { renderStatus: status, updatedAt: new Date() } }
    );
    return result.modifiedCount === 1;
  }

  async updateUploadStatus(id: number, status: UploadStatus): Promise<boolean> {
    const result = await this.collection.updateOne(
      { id, renderStatus: "success", uploadStatus: { $in: uploadSourcesFor(status) } },
      { $set: { uploadStatus: status, updatedAt: new Date() } }
    );
    return result.modifiedCount === 1;
  }

  async setOutputArtifact(id: number, outputArtifact: string): Promise<boolean> {
    const result = await this.collection.updateOne(
      { id, renderStatus: "rendering", outputArtifact: { $exists: false } },
      { $set: { outputArtifact, updatedAt: new Date() } }
    );
    return result.modifiedCount === 1;
  }

  async setExternalId(id: number, externalId: string): Promise<boolean> {
    const result = await this.collection.updateOne(
      { id, uploadStatus: "uploading", externalId: { $exists: false } },
      { $set: { externalId, updatedAt: new Date() } }
    );
    return result.modifiedCount === 1;
  }

  async updateProgress(id: number, percent: number, etaLabel: string): Promise<void> {
    await this.collection.updateOne(
      { id },
      { $set: { progressPercent: clampProgress(percent), etaLabel, updatedAt: new Date() } }
    );
  }

  async appendLog(id: number, message: string): Promise<void> {
    const now = new Date();
    // $push keeps concurrent appends from overwriting each other
    await this.collection.updateOne({ id }, { $push: { log: { at: now, message } }, $set: { updatedAt: now } });
  }
}
