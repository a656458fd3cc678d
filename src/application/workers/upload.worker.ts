import {
  AuthUnavailableError,
  UploadTransportFailureError,
  err,
  errorMessage,
  ok,
  type Result,
} from "../../domain/errors/job.errors";
import type { IJobStore } from "../../domain/interfaces/ijob.store";
import type { ICredentialProvider, IVideoPlatform } from "../../domain/interfaces/ivideo.platform";

// Same rule as rendering: 100 is reserved for the final acknowledgment
const MAX_IN_FLIGHT_PERCENT = 99;

export interface UploadWorkerInput {
  jobId: number;
  outputArtifact: string;
  title: string;
  description: string;
  tags: string[];
}

export interface UploadWorkerOptions {
  categoryId: string;
}

export type UploadOutcome = Result<{ externalId: string }, AuthUnavailableError | UploadTransportFailureError>;

export interface UploadRunner {
  run(input: UploadWorkerInput): Promise<UploadOutcome>;
}

/**
 * Publishes one rendered file. Expects the job to already be `uploading`
 * (the scheduler claims it before dispatch) and ends it in `success` or `failed`.
 */
export class UploadWorker<TSession> implements UploadRunner {
  constructor(
    private readonly jobStore: IJobStore,
    private readonly credentials: ICredentialProvider<TSession>,
    private readonly platform: IVideoPlatform<TSession>,
    private readonly options: UploadWorkerOptions
  ) {}

  async run(input: UploadWorkerInput): Promise<UploadOutcome> {
    const { jobId } = input;

    const session = await this.credentials.getSession();
    if (!session.ok) {
      console.error(`[UploadWorker] Job ${jobId}: ${session.error.message}`);
      await this.markFailed(jobId, `Upload failed: ${session.error.message}`);
      return err(session.error);
    }

    let lastPercent = 0;
    let pushes: Promise<void> = Promise.resolve();

    try {
      console.log(`[UploadWorker] Job ${jobId}: uploading ${input.outputArtifact}`);
      const externalId = await this.platform.uploadVideo({
        session: session.value,
        filePath: input.outputArtifact,
        metadata: {
          title: input.title,
          description: input.description,
          tags: input.tags,
          categoryId: this.options.categoryId,
          privacyStatus: "private",
          madeForKids: false,
        },
        onProgress: (fraction) => {
          const percent = Math.min(MAX_IN_FLIGHT_PERCENT, Math.max(0, Math.floor(fraction * 100)));
          if (percent < lastPercent) {
            return;
          }
          lastPercent = percent;
          pushes = pushes
            .then(() => this.jobStore.updateProgress(jobId, percent, "uploading"))
            .catch((error) => {
              console.warn(`[UploadWorker] Job ${jobId}: failed to record progress:`, error);
            });
        },
      });
      await pushes;

      await this.jobStore.setExternalId(jobId, externalId);
      await this.jobStore.updateProgress(jobId, 100, "uploaded");
      await this.jobStore.updateUploadStatus(jobId, "success");
      await this.jobStore.appendLog(jobId, `Upload succeeded! Video ID: ${externalId}`);
      console.log(`[UploadWorker] Job ${jobId}: uploaded as ${externalId}`);

      return ok({ externalId });
    } catch (error) {
      await pushes;
      const failure =
        error instanceof UploadTransportFailureError ? error : new UploadTransportFailureError(errorMessage(error));
      console.error(`[UploadWorker] Job ${jobId} failed:`, error);
      await this.markFailed(
        jobId,
        `Upload failed: ${failure.message}. The rendered file is kept at ${input.outputArtifact} for manual resubmission.`
      );
      return err(failure);
    }
  }

  private async markFailed(jobId: number, message: string): Promise<void> {
    try {
      await this.jobStore.updateUploadStatus(jobId, "failed");
      await this.jobStore.appendLog(jobId, message);
    } catch (error) {
      console.error(`[UploadWorker] Job ${jobId}: could not record the failure:`, error);
    }
  }
}
