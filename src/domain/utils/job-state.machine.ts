/**
 * Render and upload lifecycles.
 *
 * render: pending -> rendering -> success | failed   (pending -> failed when the encoder is missing)
 * upload: idle -> waiting_schedule -> uploading -> success | failed
 *
 * Upload transitions are only legal once the render succeeded. Terminal states have no
 * outgoing edges; retrying means submitting a new job.
 */

import type { RenderStatus, UploadStatus } from "../entities/render-job";

const RENDER_TRANSITIONS: Record<RenderStatus, readonly RenderStatus[]> = {
  pending: ["rendering", "failed"],
  rendering: ["success", "failed"],
  success: [],
  failed: [],
};

const UPLOAD_TRANSITIONS: Record<UploadStatus, readonly UploadStatus[]> = {
  idle: ["waiting_schedule"],
  waiting_schedule: ["uploading"],
  uploading: ["success", "failed"],
  success: [],
  failed: [],
};

const RENDER_STATUSES: readonly RenderStatus[] = ["pending", "rendering", "success", "failed"];
const UPLOAD_STATUSES: readonly UploadStatus[] = ["idle", "waiting_schedule", "uploading", "success", "failed"];

export function canTransitionRender(from: RenderStatus, to: RenderStatus): boolean {
  return RENDER_TRANSITIONS[from].includes(to);
}

export function canTransitionUpload(from: UploadStatus, to: UploadStatus, renderStatus: RenderStatus): boolean {
  if (renderStatus !== "success") {
    return false;
  }
  return UPLOAD_TRANSITIONS[from].includes(to);
}

/**
 * States a render may be in for a move to `to` to be accepted.
 * Stores use this as the filter of a compare-and-set update.
 */
export function renderSourcesFor(to: RenderStatus): RenderStatus[] {
  return RENDER_STATUSES.filter((from) => RENDER_TRANSITIONS[from].includes(to));
}

export function uploadSourcesFor(to: UploadStatus): UploadStatus[] {
  return UPLOAD_STATUSES.filter((from) => UPLOAD_TRANSITIONS[from].includes(to));
}

export function clampProgress(percent: number): number {
  if (!Number.isFinite(percent)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.floor(percent)));
}
