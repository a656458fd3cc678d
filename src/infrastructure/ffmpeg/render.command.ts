import type { WatermarkMode } from "../../domain/entities/render-job";

// Height of the overlay band at the bottom of the source clips
export const WATERMARK_BAND_HEIGHT = 86;
// Width trimmed from the right edge by zoom_top_left
export const WATERMARK_RIGHT_WIDTH = 150;
export const ZOOM_OUTPUT_WIDTH = 1920;
export const ZOOM_OUTPUT_HEIGHT = 1080;

const BLUR_RADIUS = 20;

export interface VideoCodecChoice {
  codec: string;
  preset: string;
  label: string;
}

export const HARDWARE_CODEC: VideoCodecChoice = { codec: "h264_nvenc", preset: "p1", label: "hardware (NVIDIA NVENC)" };
export const SOFTWARE_CODEC: VideoCodecChoice = { codec: "libx264", preset: "ultrafast", label: "software (libx264)" };

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface WatermarkGeometry {
  width: number; // output frame size
  height: number;
  kept: Region; // part of the source frame that reaches the output
  obscured: Region | null; // part of the kept region blurred in place
}

export interface RenderCommandParams {
  videoSource: string;
  audioSource: string;
  outputPath: string;
  targetSeconds: number;
  watermarkMode: WatermarkMode;
  muteOriginal: boolean;
  codec: VideoCodecChoice;
}

export function selectVideoCodec(hasAccelerator: boolean): VideoCodecChoice {
  return hasAccelerator ? HARDWARE_CODEC : SOFTWARE_CODEC;
}

export function targetSecondsFor(durationHours: number): number {
  return Math.round(durationHours * 3600);
}

/**
 * What each watermark mode does to a `width` x `height` source frame.
 */
export function watermarkGeometry(mode: WatermarkMode, width: number, height: number): WatermarkGeometry {
  const band = WATERMARK_BAND_HEIGHT;
  switch (mode) {
    case "none":
      return { width, height, kept: { x: 0, y: 0, width, height }, obscured: null };
    case "crop_only":
      return { width, height: height - band, kept: { x: 0, y: 0, width, height: height - band }, obscured: null };
    case "blur":
      return {
        width,
        height,
        kept: { x: 0, y: 0, width, height },
        obscured: { x: 0, y: height - band, width, height: band },
      };
    case "zoom_top_left":
      return {
        width: ZOOM_OUTPUT_WIDTH,
        height: ZOOM_OUTPUT_HEIGHT,
        kept: { x: 0, y: 0, width: width - WATERMARK_RIGHT_WIDTH, height: height - band },
        obscured: null,
      };
  }
}

export function describeWatermarkMode(mode: WatermarkMode): string {
  switch (mode) {
    case "none":
      return "Watermark mode none: video kept as is.";
    case "crop_only":
      return `Watermark mode crop_only: cutting the bottom ${WATERMARK_BAND_HEIGHT}px.`;
    case "blur":
      return `Watermark mode blur: blurring the bottom ${WATERMARK_BAND_HEIGHT}px in place.`;
    case "zoom_top_left":
      return `Watermark mode zoom_top_left: cropping the bottom ${WATERMARK_BAND_HEIGHT}px and right ${WATERMARK_RIGHT_WIDTH}px, rescaling to ${ZOOM_OUTPUT_WIDTH}x${ZOOM_OUTPUT_HEIGHT}.`;
  }
}

/**
 * Filter graph segment for the video stream, reading [0:v] and writing [vout].
 * Returns null when the stream is passed through untouched.
 */
export function buildVideoFilter(mode: WatermarkMode): string | null {
  const band = WATERMARK_BAND_HEIGHT;
  switch (mode) {
    case "none":
      return null;
    case "crop_only":
      return `[0:v]crop=iw:ih-${band}:0:0[vout]`;
    case "blur":
      return (
        `[0:v]split=2[base][band];` +
        `[band]crop=iw:${band}:0:ih-${band},boxblur=luma_radius=${BLUR_RADIUS}:luma_power=2[blurred];` +
        `[base][blurred]overlay=0:H-${band}[vout]`
      );
    case "zoom_top_left":
      return (
        `[0:v]crop=iw-${WATERMARK_RIGHT_WIDTH}:ih-${band}:0:0,` +
        `scale=${ZOOM_OUTPUT_WIDTH}:${ZOOM_OUTPUT_HEIGHT}:flags=lanczos[vout]`
      );
  }
}

/**
 * Audio routing. Muted: only the external track. Otherwise the original and external
 * tracks are mixed and the mix ends with the shorter of the two.
 */
export function buildAudioRouting(muteOriginal: boolean): { filter: string | null; map: string } {
  if (muteOriginal) {
    return { filter: null, map: "1:a:0" };
  }
  return { filter: "[0:a][1:a]amix=inputs=2:duration=shortest[aout]", map: "[aout]" };
}

export function buildRenderArgs(params: RenderCommandParams): string[] {
  const videoFilter = buildVideoFilter(params.watermarkMode);
  const audio = buildAudioRouting(params.muteOriginal);
  const graph = [videoFilter, audio.filter].filter((part): part is string => part !== null);

  const args = [
    "-y",
    "-stream_loop", "-1", "-i", params.videoSource,
    "-stream_loop", "-1", "-i", params.audioSource,
  ];
  if (graph.length > 0) {
    args.push("-filter_complex", graph.join(";"));
  }
  args.push(
    "-map", videoFilter ? "[vout]" : "0:v:0",
    "-map", audio.map,
    "-t", String(params.targetSeconds),
    "-c:v", params.codec.codec,
    "-preset", params.codec.preset,
    "-c:a", "aac",
    "-b:a", "192k",
    params.outputPath
  );
  return args;
}
