import { join } from "path";
import type { WatermarkMode } from "../../domain/entities/render-job";
import {
  EncodeFailureError,
  IllegalTransitionError,
  ToolUnavailableError,
  err,
  errorMessage,
  ok,
  type Result,
} from "../../domain/errors/job.errors";
import type { IEncoder } from "../../domain/interfaces/iencoder";
import type { IJobStore } from "../../domain/interfaces/ijob.store";
import { estimateProgress, parseEncodedSeconds } from "../../infrastructure/ffmpeg/progress.estimator";
import {
  buildRenderArgs,
  describeWatermarkMode,
  selectVideoCodec,
  targetSecondsFor,
} from "../../infrastructure/ffmpeg/render.command";

const DIAGNOSTIC_TAIL_LINES = 20;

export interface RenderWorkerInput {
  jobId: number;
  videoSource: string;
  audioSource: string;
  targetDurationHours: number;
  watermarkMode: WatermarkMode;
  muteOriginal: boolean;
}

export interface RenderWorkerOptions {
  outputDir: string;
  now?: () => Date;
}

export type RenderFailure = ToolUnavailableError | EncodeFailureError | IllegalTransitionError;
export type RenderOutcome = Result<{ outputArtifact: string }, RenderFailure>;

export interface RenderRunner {
  run(input: RenderWorkerInput): Promise<RenderOutcome>;
}

/**
 * Drives one encode for one job: pending -> rendering -> success | failed.
 * Progress is pushed to the store as ffmpeg reports it; 100% is written only after a
 * zero exit code.
 */
export class RenderWorker implements RenderRunner {
  private readonly now: () => Date;

  constructor(
    private readonly jobStore: IJobStore,
    private readonly encoder: IEncoder,
    private readonly options: RenderWorkerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async run(input: RenderWorkerInput): Promise<RenderOutcome> {
    const { jobId } = input;

    try {
      if (!(await this.encoder.isAvailable())) {
        const failure = new ToolUnavailableError("FFmpeg not found; nothing was rendered.");
        if (!(await this.jobStore.updateRenderStatus(jobId, "failed"))) {
          const skipped = new IllegalTransitionError(`Job ${jobId} is not pending; render skipped.`);
          console.warn(`[RenderWorker] ${skipped.message}`);
          return err(skipped);
        }
        await this.jobStore.appendLog(jobId, `Rendering failed: ${failure.message}`);
        console.error(`[RenderWorker] Job ${jobId}: ${failure.message}`);
        return err(failure);
      }

      const codec = selectVideoCodec(await this.encoder.hasHardwareAccelerator());

      if (!(await this.jobStore.updateRenderStatus(jobId, "rendering"))) {
        const failure = new IllegalTransitionError(`Job ${jobId} is not pending; render skipped.`);
        console.warn(`[RenderWorker] ${failure.message}`);
        return err(failure);
      }

      await this.jobStore.appendLog(jobId, `Render started with ${codec.label} encoder (${codec.codec}, preset ${codec.preset}).`);
      await this.jobStore.appendLog(jobId, describeWatermarkMode(input.watermarkMode));
      await this.jobStore.appendLog(
        jobId,
        input.muteOriginal
          ? "Audio: original track muted, using the external track only."
          : "Audio: mixing the original and external tracks (ends with the shorter one)."
      );

      return await this.encode(input, codec);
    } catch (error) {
      const failure =
        isMissingBinaryError(error)
          ? new ToolUnavailableError(`FFmpeg could not be started: ${errorMessage(error)}`)
          : new EncodeFailureError(errorMessage(error));
      console.error(`[RenderWorker] Job ${jobId} failed:`, error);
      await this.markFailed(jobId, `Rendering failed: ${failure.message}`);
      return err(failure);
    }
  }

  private async encode(input: RenderWorkerInput, codec: ReturnType<typeof selectVideoCodec>): Promise<RenderOutcome> {
    const { jobId } = input;
    const targetSeconds = targetSecondsFor(input.targetDurationHours);
    const startedAt = this.now();
    const outputArtifact = join(this.options.outputDir, `render_${jobId}_${startedAt.getTime()}.mp4`);
    const args = buildRenderArgs({
      videoSource: input.videoSource,
      audioSource: input.audioSource,
      outputPath: outputArtifact,
      targetSeconds,
      watermarkMode: input.watermarkMode,
      muteOriginal: input.muteOriginal,
      codec,
    });

    console.log(`[RenderWorker] Job ${jobId}: rendering ${targetSeconds}s to ${outputArtifact}`);

    const tail: string[] = [];
    let lastPercent = 0;
    // Store writes are chained so they land in the order ffmpeg reported them
    let pushes: Promise<void> = Promise.resolve();

    const exit = await this.encoder.encode(args, (line) => {
      tail.push(line);
      if (tail.length > DIAGNOSTIC_TAIL_LINES) {
        tail.shift();
      }

      const encodedSeconds = parseEncodedSeconds(line);
      if (encodedSeconds === null) {
        return;
      }
      const estimate = estimateProgress({ encodedSeconds, targetSeconds, startedAt, now: this.now() });
      if (estimate.percent < lastPercent) {
        return;
      }
      lastPercent = estimate.percent;
      pushes = pushes
        .then(() => this.jobStore.updateProgress(jobId, estimate.percent, estimate.etaLabel))
        .catch((error) => {
          console.warn(`[RenderWorker] Job ${jobId}: failed to record progress:`, error);
        });
    });
    await pushes;

    if (exit.exitCode !== 0) {
      const reason = exit.exitCode === null ? `killed by ${exit.signal ?? "signal"}` : `exit code ${exit.exitCode}`;
      const diagnosticTail = tail.join("\n");
      const failure = new EncodeFailureError(`FFmpeg failed (${reason}).`, diagnosticTail);
      console.error(`[RenderWorker] Job ${jobId}: ${failure.message}`);
      await this.markFailed(jobId, `Rendering failed: ${failure.message}\n${diagnosticTail}`);
      return err(failure);
    }

    await this.jobStore.setOutputArtifact(jobId, outputArtifact);
    await this.jobStore.updateProgress(jobId, 100, "done");
    await this.jobStore.updateRenderStatus(jobId, "success");
    await this.jobStore.updateUploadStatus(jobId, "waiting_schedule");
    await this.jobStore.appendLog(jobId, "Render finished. Waiting for the scheduled upload time.");
    console.log(`[RenderWorker] Job ${jobId}: render finished`);

    return ok({ outputArtifact });
  }

  /** Logs the failure only when the job actually moved to `failed`; a finished render keeps its history. */
  private async markFailed(jobId: number, message: string): Promise<void> {
    try {
      if (!(await this.jobStore.updateRenderStatus(jobId, "failed"))) {
        console.warn(`[RenderWorker] Job ${jobId}: not marked failed, render status already settled`);
        return;
      }
      await this.jobStore.appendLog(jobId, message);
    } catch (error) {
      console.error(`[RenderWorker] Job ${jobId}: could not record the failure:`, error);
    }
  }
}

function isMissingBinaryError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
