import type { RenderJob } from "../../domain/entities/render-job";
import type { IJobStore } from "../../domain/interfaces/ijob.store";

export class GetRenderJobsUseCase {
  constructor(private jobStore: IJobStore) {}

  /**
   * All jobs, newest first
   */
  async execute(): Promise<RenderJob[]> {
    return this.jobStore.listAll();
  }
}
