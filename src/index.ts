import express from "express";
import cors from "cors";
import multer from "multer";
import { mkdir } from "fs/promises";
import { config } from "./infrastructure/config/app.config";
import { errorMessage } from "./domain/errors/job.errors";
import type { IJobStore } from "./domain/interfaces/ijob.store";
import { MongoDBConnection } from "./infrastructure/database/mongodb.connection";
import { RenderJobRepository } from "./infrastructure/database/repositories/render-job.repository";
import { InMemoryJobStore } from "./infrastructure/database/in.memory.job.store";
import { FfmpegEncoder } from "./infrastructure/ffmpeg/ffmpeg.encoder";
import { GoogleOAuthCredentialProvider } from "./infrastructure/youtube/google-oauth.credential.provider";
import { YouTubeVideoPlatform } from "./infrastructure/youtube/youtube.video.platform";
import { UploadSchedulerCron } from "./infrastructure/cron/upload-scheduler.cron";
import { RenderWorker } from "./application/workers/render.worker";
import { UploadWorker } from "./application/workers/upload.worker";
import { RenderQueue } from "./application/services/render.queue";
import { SubmitRenderJobUseCase } from "./application/use-cases/submit-render-job.use-case";
import { GetRenderJobsUseCase } from "./application/use-cases/get-render-jobs.use-case";
import { GetRenderJobUseCase } from "./application/use-cases/get-render-job.use-case";
import { GetEncoderStatusUseCase } from "./application/use-cases/get-encoder-status.use-case";
import { RenderJobController } from "./presentation/controllers/render-job.controller";
import { createRenderJobRoutes, createSystemRoutes } from "./presentation/routes/render-job.routes";
import { stopServices, type RunningServices } from "./infrastructure/lifecycle/service.shutdown";

let running: RunningServices | null = null;

async function main(): Promise<void> {
  await mkdir(config.uploadDir, { recursive: true });
  await mkdir(config.outputDir, { recursive: true });

  // Job store
  let mongo: MongoDBConnection | null = null;
  let jobStore: IJobStore;
  if (config.jobStore === "memory") {
    console.warn("JOB_STORE=memory: jobs are kept in process memory and lost on restart");
    jobStore = new InMemoryJobStore();
  } else {
    mongo = new MongoDBConnection(config.mongodb.uri, config.mongodb.dbName);
    jobStore = new RenderJobRepository(await mongo.connect());
  }

  // Infrastructure
  const encoder = new FfmpegEncoder({
    ffmpegPath: config.ffmpegPath,
    nvidiaSmiPath: config.nvidiaSmiPath,
  });
  const credentialProvider = new GoogleOAuthCredentialProvider({
    clientSecretsFile: config.youtube.clientSecretsFile,
    tokenFile: config.youtube.tokenFile,
  });
  const videoPlatform = new YouTubeVideoPlatform({ chunkSize: config.youtube.chunkSizeBytes });

  // Workers
  const renderWorker = new RenderWorker(jobStore, encoder, { outputDir: config.outputDir });
  const uploadWorker = new UploadWorker(jobStore, credentialProvider, videoPlatform, {
    categoryId: config.youtube.categoryId,
  });
  const renderQueue = new RenderQueue(config.renderConcurrency);

  // Use cases
  const submitRenderJobUseCase = new SubmitRenderJobUseCase(jobStore, renderQueue, renderWorker, {
    sourceRoot: config.uploadDir,
  });
  const getRenderJobsUseCase = new GetRenderJobsUseCase(jobStore);
  const getRenderJobUseCase = new GetRenderJobUseCase(jobStore);
  const getEncoderStatusUseCase = new GetEncoderStatusUseCase(encoder, renderQueue);

  // Controllers
  const renderJobController = new RenderJobController(
    submitRenderJobUseCase,
    getRenderJobsUseCase,
    getRenderJobUseCase,
    getEncoderStatusUseCase
  );

  // Initialize Express app
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Routes
  app.use("/api/jobs", createRenderJobRoutes(renderJobController, config.uploadDir));
  app.use("/api/system", createSystemRoutes(renderJobController));

  // Error handling middleware
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: `${err.message}${err.field ? ` (${err.field})` : ""}` });
      return;
    }
    console.error("Error:", err);
    res.status(500).json({ error: errorMessage(err) || "Internal server error" });
  });

  // Upload scheduler
  const uploadScheduler = new UploadSchedulerCron(jobStore, uploadWorker, {
    schedule: config.uploadSchedulerCron,
  });
  uploadScheduler.start();

  const server = app.listen(config.port, () => {
    console.log(`Loop render service running on port ${config.port}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
    console.log(`API endpoints: http://localhost:${config.port}/api/jobs`);
  });

  running = { server, uploadScheduler, mongo };
}

async function shutdown(signal: string): Promise<void> {
  console.log(`${signal} received, shutting down gracefully`);
  if (running) {
    const services = running;
    running = null;
    await stopServices(services);
  }
  process.exit(0);
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
