import * as cron from "node-cron";
import type { RenderJob } from "../../domain/entities/render-job";
import { SchedulerTickError, errorMessage } from "../../domain/errors/job.errors";
import type { IJobStore } from "../../domain/interfaces/ijob.store";
import type { UploadRunner } from "../../application/workers/upload.worker";

export const DEFAULT_UPLOAD_SCHEDULE = "*/20 * * * * *"; // every 20 seconds

export interface UploadSchedulerOptions {
  schedule?: string; // node-cron expression, seconds field allowed
  now?: () => Date;
}

export interface UploadTickSummary {
  dispatched: number[];
  deferred: number;
  errors: number;
}

/**
 * Polls the store for rendered jobs whose schedule has arrived and hands them to the upload
 * worker. A job is switched to `uploading` before dispatch; the switch is compare-and-set, so
 * a job that another tick already claimed is skipped and no job is dispatched twice.
 */
export class UploadSchedulerCron {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly schedule: string;
  private readonly now: () => Date;

  constructor(
    private readonly jobStore: IJobStore,
    private readonly uploadRunner: UploadRunner,
    options: UploadSchedulerOptions = {}
  ) {
    this.schedule = options.schedule ?? DEFAULT_UPLOAD_SCHEDULE;
    this.now = options.now ?? (() => new Date());
    if (!cron.validate(this.schedule)) {
      throw new Error(`Invalid upload scheduler cron expression: ${this.schedule}`);
    }
  }

  start(): void {
    if (this.task) {
      console.log("[UploadSchedulerCron] Scheduler is already running");
      return;
    }

    this.task = cron.schedule(this.schedule, async () => {
      await this.runTick();
    });

    console.log(`[UploadSchedulerCron] Started upload scheduler (${this.schedule})`);
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log("[UploadSchedulerCron] Stopped upload scheduler");
    }
  }

  isActive(): boolean {
    return this.task !== null;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Waits for every upload dispatched so far to settle. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * One scheduled firing. Never throws: a failing tick is logged and the next firing runs
   * as usual. Skipped while the previous tick is still evaluating.
   */
  async runTick(): Promise<UploadTickSummary | null> {
    if (this.isRunning) {
      console.log("[UploadSchedulerCron] Previous tick is still in progress, skipping this execution");
      return null;
    }

    this.isRunning = true;
    try {
      const summary = await this.tick();
      if (summary.dispatched.length > 0 || summary.errors > 0) {
        console.log(
          `[UploadSchedulerCron] Tick completed: ${summary.dispatched.length} dispatched, ` +
            `${summary.deferred} waiting for schedule, ${summary.errors} errors`
        );
      }
      return summary;
    } catch (error) {
      const tickError = new SchedulerTickError(`Upload scheduler tick failed: ${errorMessage(error)}`);
      console.error(`[UploadSchedulerCron] ${tickError.message}`, error);
      return null;
    } finally {
      this.isRunning = false;
    }
  }

  async tick(now: Date = this.now()): Promise<UploadTickSummary> {
    const summary: UploadTickSummary = { dispatched: [], deferred: 0, errors: 0 };
    const jobs = await this.jobStore.listReadyForUpload();

    for (const job of jobs) {
      if (job.scheduledAt.getTime() > now.getTime()) {
        summary.deferred++;
        continue;
      }

      try {
        if (await this.dispatch(job)) {
          summary.dispatched.push(job.id);
        }
      } catch (error) {
        console.error(`[UploadSchedulerCron] Failed to dispatch job ${job.id}:`, error);
        summary.errors++;
      }
    }

    return summary;
  }

  private async dispatch(job: RenderJob): Promise<boolean> {
    const claimed = await this.jobStore.updateUploadStatus(job.id, "uploading");
    if (!claimed) {
      console.log(`[UploadSchedulerCron] Job ${job.id} was already claimed, skipping`);
      return false;
    }

    const outputArtifact = job.outputArtifact;
    if (!outputArtifact) {
      await this.releaseClaim(job.id, "Upload failed: no rendered file is recorded for this job.");
      return false;
    }

    try {
      await this.jobStore.appendLog(job.id, "Schedule reached. Uploading...");
    } catch (error) {
      // Claimed jobs must not be left in `uploading`
      await this.releaseClaim(job.id, `Upload failed: could not start the upload (${errorMessage(error)}).`);
      throw error;
    }

    const upload = this.uploadRunner
      .run({
        jobId: job.id,
        outputArtifact,
        title: job.title,
        description: job.description,
        tags: job.tags,
      })
      .then((outcome) => {
        if (!outcome.ok) {
          console.warn(`[UploadSchedulerCron] Upload for job ${job.id} ended with ${outcome.error.code}`);
        }
      })
      .catch((error) => {
        console.error(`[UploadSchedulerCron] Upload for job ${job.id} threw:`, error);
      })
      .finally(() => {
        this.inFlight.delete(upload);
      });
    this.inFlight.add(upload);

    return true;
  }

  /** Moves a claimed job to `failed`. Store errors here are logged, not thrown. */
  private async releaseClaim(jobId: number, message: string): Promise<void> {
    try {
      await this.jobStore.updateUploadStatus(jobId, "failed");
      await this.jobStore.appendLog(jobId, message);
    } catch (error) {
      console.error(`[UploadSchedulerCron] Could not mark job ${jobId} as failed:`, error);
    }
  }
}
