export type WatermarkMode = "none" | "crop_only" | "blur" | "zoom_top_left";

export const WATERMARK_MODES: readonly WatermarkMode[] = ["none", "crop_only", "blur", "zoom_top_left"];

export type RenderStatus = "pending" | "rendering" | "success" | "failed";

export type UploadStatus = "idle" | "waiting_schedule" | "uploading" | "success" | "failed";

export interface JobLogEntry {
  at: Date;
  message: string;
}

/**
 * Submission fields of a job. Everything here is fixed once the job is created.
 */
export interface RenderJobSpec {
  videoSource: string;
  audioSource: string;
  targetDurationHours: number; // 0.1 - 24.0
  watermarkMode: WatermarkMode;
  muteOriginal: boolean;
  title: string;
  description: string;
  tags: string[];
  scheduledAt: Date;
}

export interface RenderJob extends RenderJobSpec {
  id: number;
  renderStatus: RenderStatus;
  uploadStatus: UploadStatus;
  progressPercent: number; // 0-100, meaning depends on the active phase
  etaLabel: string;
  outputArtifact?: string; // Set only on render success
  externalId?: string; // Platform video id, set only on upload success
  log: JobLogEntry[];
  createdAt: Date;
  updatedAt: Date;
}
