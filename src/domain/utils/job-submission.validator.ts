/**
 * Validation for render job submissions.
 * Raw values come from form fields or JSON bodies, so everything arrives as unknown.
 */

import { WATERMARK_MODES, type RenderJobSpec, type WatermarkMode } from "../entities/render-job";
import { err, ok, type Result } from "../errors/job.errors";

export const MIN_DURATION_HOURS = 0.1;
export const MAX_DURATION_HOURS = 24;
export const MAX_TITLE_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 5000;

export interface RenderJobSubmissionInput {
  videoSource?: unknown;
  audioSource?: unknown;
  durationHours?: unknown;
  watermarkMode?: unknown;
  muteOriginal?: unknown;
  title?: unknown;
  description?: unknown;
  tags?: unknown;
  scheduledAt?: unknown;
}

export function isWatermarkMode(value: unknown): value is WatermarkMode {
  return typeof value === "string" && WATERMARK_MODES.some((mode) => mode === value);
}

export function parseDurationHours(value: unknown): number | null {
  const parsed = typeof value === "number" ? value : typeof value === "string" && value.trim() ? Number(value) : NaN;
  if (!Number.isFinite(parsed) || parsed < MIN_DURATION_HOURS || parsed > MAX_DURATION_HOURS) {
    return null;
  }
  return parsed;
}

/**
 * Accepts booleans and the usual form encodings ("true", "1", "on", ...).
 * Returns null for anything else so the caller can report it.
 */
export function parseBooleanFlag(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value === 1 ? true : value === 0 ? false : null;
  if (typeof value !== "string") return null;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "on", "yes"].includes(normalized)) return true;
  if (["false", "0", "off", "no"].includes(normalized)) return false;
  return null;
}

/**
 * Tags arrive either as an array or as a comma separated string ("asmr,sleep").
 * Entries are trimmed and empty ones dropped; order is preserved.
 */
export function parseTags(value: unknown): string[] | null {
  if (value === undefined || value === null) return [];
  const raw = Array.isArray(value) ? value : typeof value === "string" ? value.split(",") : null;
  if (!raw) return null;

  const tags: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== "string") return null;
    const tag = entry.trim();
    if (tag) tags.push(tag);
  }
  return tags;
}

export function parseScheduledAt(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== "string" && typeof value !== "number") return null;
  if (typeof value === "string" && !value.trim()) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function requiredString(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

export function validateRenderJobSubmission(input: RenderJobSubmissionInput): Result<RenderJobSpec, string[]> {
  const errors: string[] = [];

  const videoSource = requiredString(input.videoSource);
  if (!videoSource) errors.push("videoSource is required");

  const audioSource = requiredString(input.audioSource);
  if (!audioSource) errors.push("audioSource is required");

  const targetDurationHours = parseDurationHours(input.durationHours);
  if (targetDurationHours === null) {
    errors.push(`durationHours must be a number between ${MIN_DURATION_HOURS} and ${MAX_DURATION_HOURS}`);
  }

  let watermarkMode: WatermarkMode = "zoom_top_left";
  if (input.watermarkMode !== undefined && input.watermarkMode !== "") {
    if (isWatermarkMode(input.watermarkMode)) {
      watermarkMode = input.watermarkMode;
    } else {
      errors.push(`watermarkMode must be one of: ${WATERMARK_MODES.join(", ")}`);
    }
  }

  let muteOriginal = true;
  if (input.muteOriginal !== undefined && input.muteOriginal !== "") {
    const parsed = parseBooleanFlag(input.muteOriginal);
    if (parsed === null) {
      errors.push("muteOriginal must be a boolean");
    } else {
      muteOriginal = parsed;
    }
  }

  const title = requiredString(input.title);
  if (!title) {
    errors.push("title is required");
  } else if (title.length > MAX_TITLE_LENGTH) {
    errors.push(`title must be at most ${MAX_TITLE_LENGTH} characters`);
  }

  let description = "";
  if (input.description !== undefined && input.description !== null) {
    if (typeof input.description !== "string") {
      errors.push("description must be a string");
    } else if (input.description.length > MAX_DESCRIPTION_LENGTH) {
      errors.push(`description must be at most ${MAX_DESCRIPTION_LENGTH} characters`);
    } else {
      description = input.description;
    }
  }

  const tags = parseTags(input.tags);
  if (!tags) errors.push("tags must be a list of strings or a comma separated string");

  const scheduledAt = parseScheduledAt(input.scheduledAt);
  if (!scheduledAt) errors.push("scheduledAt must be a valid date");

  if (
    errors.length > 0 ||
    !videoSource ||
    !audioSource ||
    targetDurationHours === null ||
    !title ||
    !tags ||
    !scheduledAt
  ) {
    return err(errors);
  }

  return ok({
    videoSource,
    audioSource,
    targetDurationHours,
    watermarkMode,
    muteOriginal,
    title,
    description,
    tags,
    scheduledAt,
  });
}
