// Persistence contract for render jobs. Pure data access; transition rules live in job-state.machine.

import type { RenderJob, RenderJobSpec, RenderStatus, UploadStatus } from "../entities/render-job";

export interface IJobStore {
  create(spec: RenderJobSpec): Promise<number>;
  get(id: number): Promise<RenderJob | null>;
  listAll(): Promise<RenderJob[]>; // newest first
  listReadyForUpload(): Promise<RenderJob[]>; // renderStatus=success and uploadStatus=waiting_schedule

  // Compare-and-set transitions. Resolve to false when the move is illegal from the stored state.
  updateRenderStatus(id: number, status: RenderStatus): Promise<boolean>;
  updateUploadStatus(id: number, status: UploadStatus): Promise<boolean>;

  // Write-once fields.
  setOutputArtifact(id: number, outputArtifact: string): Promise<boolean>;
  setExternalId(id: number, externalId: string): Promise<boolean>;

  updateProgress(id: number, percent: number, etaLabel: string): Promise<void>;
  appendLog(id: number, message: string): Promise<void>;
}
