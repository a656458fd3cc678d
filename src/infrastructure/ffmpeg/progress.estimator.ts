/**
 * Progress and ETA estimation from ffmpeg's diagnostic stream.
 *
 * ffmpeg periodically writes a stats line such as
 *   frame= 2880 fps=118 q=28.0 size=   10240kB time=00:02:00.00 bitrate= 699.1kbits/s speed=4.9x
 * The `time=` token is how much output has been encoded so far.
 */

// Render percent stays below 100 until the process exit confirms success
export const MAX_IN_FLIGHT_PERCENT = 99;

const TIME_TOKEN = /time=(\d+):([0-5]\d):([0-5]\d(?:\.\d+)?)/;

export interface ProgressEstimate {
  percent: number;
  etaLabel: string;
  speed?: number; // encoded seconds per wall-clock second
  remainingSeconds?: number;
  eta?: Date;
}

export interface ProgressSample {
  encodedSeconds: number;
  targetSeconds: number;
  startedAt: Date;
  now: Date;
}

/**
 * Extracts the encoded-time token from one diagnostic line, in seconds.
 * Lines without a token (banner, stream mapping, `time=N/A`, negative start times) give null.
 */
export function parseEncodedSeconds(line: string): number | null {
  const match = TIME_TOKEN.exec(line);
  if (!match) {
    return null;
  }
  const [, hours, minutes, seconds] = match;
  const total = Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
  return Number.isFinite(total) ? total : null;
}

export function formatRemaining(totalSeconds: number): string {
  const rounded = Math.max(0, Math.ceil(totalSeconds));
  const hours = Math.floor(rounded / 3600);
  const minutes = Math.floor((rounded % 3600) / 60);
  const seconds = rounded % 60;
  const pad = (value: number) => String(value).padStart(2, "0");

  if (hours > 0) {
    return `${hours}h ${pad(minutes)}m ${pad(seconds)}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${pad(seconds)}s`;
  }
  return `${seconds}s`;
}

export function renderPercent(encodedSeconds: number, targetSeconds: number): number {
  if (!(targetSeconds > 0) || !(encodedSeconds > 0)) {
    return 0;
  }
  return Math.min(MAX_IN_FLIGHT_PERCENT, Math.floor((100 * encodedSeconds) / targetSeconds));
}

export function estimateProgress(sample: ProgressSample): ProgressEstimate {
  const { encodedSeconds, targetSeconds, startedAt, now } = sample;
  const percent = renderPercent(encodedSeconds, targetSeconds);
  const elapsedSeconds = (now.getTime() - startedAt.getTime()) / 1000;

  if (encodedSeconds <= 0 || elapsedSeconds <= 0) {
    return { percent, etaLabel: "estimating" };
  }

  const speed = encodedSeconds / elapsedSeconds;
  const remainingSeconds = Math.max(0, targetSeconds - encodedSeconds) / speed;
  const eta = new Date(now.getTime() + remainingSeconds * 1000);

  return {
    percent,
    speed,
    remainingSeconds,
    eta,
    etaLabel: `${formatRemaining(remainingSeconds)} left (ETA ${eta.toISOString()})`,
  };
}
