import type { JobLogEntry, RenderJob, RenderStatus, UploadStatus, WatermarkMode } from "../../domain/entities/render-job";

export interface RenderJobResponse {
  id: number;
  title: string;
  description: string;
  tags: string[];
  targetDurationHours: number;
  watermarkMode: WatermarkMode;
  muteOriginal: boolean;
  scheduledAt: string;
  renderStatus: RenderStatus;
  uploadStatus: UploadStatus;
  progressPercent: number;
  etaLabel: string;
  outputArtifact?: string;
  externalId?: string;
  log: string[];
  createdAt: string;
  updatedAt: string;
}

export interface RenderJobListResponse {
  jobs: RenderJobResponse[];
  total: number;
}

/** `[YYYY-MM-DD HH:MM:SS] message`, UTC */
export function formatLogEntry(entry: JobLogEntry): string {
  const timestamp = entry.at.toISOString().replace("T", " ").slice(0, 19);
  return `[${timestamp}] ${entry.message}`;
}

export function toRenderJobResponse(job: RenderJob): RenderJobResponse {
  return {
    id: job.id,
    title: job.title,
    description: job.description,
    tags: job.tags,
    targetDurationHours: job.targetDurationHours,
    watermarkMode: job.watermarkMode,
    muteOriginal: job.muteOriginal,
    scheduledAt: job.scheduledAt.toISOString(),
    renderStatus: job.renderStatus,
    uploadStatus: job.uploadStatus,
    progressPercent: job.progressPercent,
    etaLabel: job.etaLabel,
    outputArtifact: job.outputArtifact,
    externalId: job.externalId,
    log: job.log.map(formatLogEntry),
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
  };
}
