/**
 * Application configuration
 * Centralizes all environment variables with type safety and default values
 */

import dotenv from "dotenv";
import { resolve } from "path";

// Load environment variables from .env file
dotenv.config();

export type JobStoreKind = "mongodb" | "memory";

export interface AppConfig {
  // Server
  port: number;

  // Job store
  jobStore: JobStoreKind;
  mongodb: {
    uri: string;
    dbName: string;
  };

  // Media
  uploadDir: string; // Where submitted source files are written
  outputDir: string; // Where rendered files are written

  // Rendering
  ffmpegPath: string;
  nvidiaSmiPath: string;
  renderConcurrency: number;

  // Uploading
  uploadSchedulerCron: string;
  youtube: {
    clientSecretsFile: string;
    tokenFile: string;
    categoryId: string;
    chunkSizeBytes: number;
  };
}

type Env = Record<string, string | undefined>;

function positiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function positiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const jobStore: JobStoreKind = env.JOB_STORE?.trim().toLowerCase() === "memory" ? "memory" : "mongodb";

  return {
    port: positiveInt(env.PORT, 3000),

    jobStore,
    mongodb: {
      uri: env.MONGODB_URI || "mongodb://localhost:27017",
      dbName: env.MONGODB_DB_NAME || "loop-render",
    },

    uploadDir: resolve(env.UPLOAD_DIR || "uploads"),
    outputDir: resolve(env.OUTPUT_DIR || "outputs"),

    ffmpegPath: env.FFMPEG_PATH || "ffmpeg",
    nvidiaSmiPath: env.NVIDIA_SMI_PATH || "nvidia-smi",
    renderConcurrency: positiveInt(env.RENDER_CONCURRENCY, 2),

    uploadSchedulerCron: env.UPLOAD_SCHEDULER_CRON || "*/20 * * * * *", // every 20 seconds
    youtube: {
      clientSecretsFile: resolve(env.YOUTUBE_CLIENT_SECRETS_FILE || "client_secrets.json"),
      tokenFile: resolve(env.YOUTUBE_TOKEN_FILE || "token.json"),
      categoryId: env.YOUTUBE_CATEGORY_ID || "22",
      chunkSizeBytes: Math.round(positiveNumber(env.UPLOAD_CHUNK_SIZE_MB, 8) * 1024 * 1024),
    },
  };
}

export const config = loadConfig();
