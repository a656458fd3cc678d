import { stat } from "fs/promises";
import { isAbsolute, relative, resolve, sep } from "path";
import type { RenderJob } from "../../domain/entities/render-job";
import { err, errorMessage, ok, type Result } from "../../domain/errors/job.errors";
import type { IJobStore } from "../../domain/interfaces/ijob.store";
import {
  validateRenderJobSubmission,
  type RenderJobSubmissionInput,
} from "../../domain/utils/job-submission.validator";
import type { RenderQueue } from "../services/render.queue";
import type { RenderRunner } from "../workers/render.worker";

export type SubmitRenderJobUseCaseParams = RenderJobSubmissionInput;

export interface SubmitRenderJobOptions {
  sourceRoot: string; // Sources must be existing files inside this directory
}

export class SubmitRenderJobUseCase {
  private readonly sourceRoot: string;

  constructor(
    private jobStore: IJobStore,
    private renderQueue: RenderQueue,
    private renderRunner: RenderRunner,
    options: SubmitRenderJobOptions
  ) {
    this.sourceRoot = resolve(options.sourceRoot);
  }

  /**
   * Validate a submission, store it as a pending job and queue its render.
   * Resolves with the validation errors instead of a job when the input is rejected.
   */
  async execute(params: SubmitRenderJobUseCaseParams): Promise<Result<RenderJob, string[]>> {
    const validation = validateRenderJobSubmission(params);
    if (!validation.ok) {
      return err(validation.error);
    }

    const videoSource = await this.resolveSource("videoSource", validation.value.videoSource);
    const audioSource = await this.resolveSource("audioSource", validation.value.audioSource);
    if (!videoSource.ok || !audioSource.ok) {
      return err([videoSource, audioSource].flatMap((source) => (source.ok ? [] : [source.error])));
    }

    const spec = { ...validation.value, videoSource: videoSource.value, audioSource: audioSource.value };
    const jobId = await this.jobStore.create(spec);
    await this.jobStore.appendLog(
      jobId,
      `Job submitted: ${spec.targetDurationHours}h render, upload scheduled for ${spec.scheduledAt.toISOString()}.`
    );

    const position = this.renderQueue.enqueue(jobId, () =>
      this.renderRunner.run({
        jobId,
        videoSource: spec.videoSource,
        audioSource: spec.audioSource,
        targetDurationHours: spec.targetDurationHours,
        watermarkMode: spec.watermarkMode,
        muteOriginal: spec.muteOriginal,
      })
    );
    if (position > 0) {
      await this.jobStore.appendLog(jobId, `Queued for rendering (position ${position}).`);
    }

    const job = await this.jobStore.get(jobId);
    if (!job) {
      throw new Error(`Render job ${jobId} not found after creation`);
    }
    return ok(job);
  }

  /**
   * Relative sources are taken from the source root. Anything outside it, including URLs,
   * is rejected before it can reach the encoder.
   */
  private async resolveSource(field: string, source: string): Promise<Result<string, string>> {
    const path = resolve(this.sourceRoot, source);
    const inside = relative(this.sourceRoot, path);
    if (!inside || inside === ".." || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
      return err(`${field} must be a file in the upload directory`);
    }

    try {
      const info = await stat(path);
      return info.isFile() ? ok(path) : err(`${field} is not a file`);
    } catch (error) {
      return err(`${field} cannot be read: ${errorMessage(error)}`);
    }
  }
}
