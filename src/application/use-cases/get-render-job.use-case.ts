import type { RenderJob } from "../../domain/entities/render-job";
import type { IJobStore } from "../../domain/interfaces/ijob.store";

export interface GetRenderJobUseCaseParams {
  jobId: number;
}

export class GetRenderJobUseCase {
  constructor(private jobStore: IJobStore) {}

  async execute(params: GetRenderJobUseCaseParams): Promise<RenderJob | null> {
    const { jobId } = params;

    const job = await this.jobStore.get(jobId);
    return job;
  }
}
