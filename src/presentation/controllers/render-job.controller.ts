import type { Request, Response } from "express";
import { unlink } from "fs/promises";
import { errorMessage } from "../../domain/errors/job.errors";
import type { SubmitRenderJobUseCase } from "../../application/use-cases/submit-render-job.use-case";
import type { GetRenderJobsUseCase } from "../../application/use-cases/get-render-jobs.use-case";
import type { GetRenderJobUseCase } from "../../application/use-cases/get-render-job.use-case";
import type { GetEncoderStatusUseCase } from "../../application/use-cases/get-encoder-status.use-case";
import { toRenderJobResponse, type RenderJobListResponse, type RenderJobResponse } from "../dto/render-job.dto";

type UploadedFiles = Request["files"];

function uploadedPath(files: UploadedFiles, field: string): string | undefined {
  if (!files || Array.isArray(files)) {
    return undefined;
  }
  return files[field]?.[0]?.path;
}

export function uploadedFilePaths(files: UploadedFiles): string[] {
  if (!files) {
    return [];
  }
  const stored = Array.isArray(files) ? files : Object.values(files).flat();
  return stored.map((file) => file.path);
}

/** Removes files multer already wrote for a submission that was rejected. */
export async function discardUploads(paths: string[]): Promise<void> {
  await Promise.all(
    paths.map(async (path) => {
      try {
        await unlink(path);
      } catch (error) {
        console.warn(`[RenderJobController] Could not remove rejected upload ${path}:`, error);
      }
    })
  );
}

function bodyField(body: unknown, field: string): unknown {
  if (typeof body !== "object" || body === null || !(field in body)) {
    return undefined;
  }
  return Reflect.get(body, field);
}

export class RenderJobController {
  constructor(
    private submitRenderJobUseCase: SubmitRenderJobUseCase,
    private getRenderJobsUseCase: GetRenderJobsUseCase,
    private getRenderJobUseCase: GetRenderJobUseCase,
    private getEncoderStatusUseCase: GetEncoderStatusUseCase
  ) {}

  async submitJob(req: Request, res: Response): Promise<void> {
    try {
      const body: unknown = req.body;

      // Uploaded files take precedence over paths given in the body
      const result = await this.submitRenderJobUseCase.execute({
        videoSource: uploadedPath(req.files, "video") ?? bodyField(body, "videoSource"),
        audioSource: uploadedPath(req.files, "audio") ?? bodyField(body, "audioSource"),
        durationHours: bodyField(body, "durationHours"),
        watermarkMode: bodyField(body, "watermarkMode"),
        muteOriginal: bodyField(body, "muteOriginal"),
        title: bodyField(body, "title"),
        description: bodyField(body, "description"),
        tags: bodyField(body, "tags"),
        scheduledAt: bodyField(body, "scheduledAt"),
      });

      if (!result.ok) {
        await discardUploads(uploadedFilePaths(req.files));
        res.status(400).json({ error: "Invalid render job", details: result.error });
        return;
      }

      const response: RenderJobResponse = toRenderJobResponse(result.value);
      res.status(201).json(response);
    } catch (error) {
      console.error("[RenderJobController] Failed to submit job:", error);
      res.status(500).json({ error: errorMessage(error) || "Failed to submit render job" });
    }
  }

  async getJobs(_req: Request, res: Response): Promise<void> {
    try {
      const jobs = await this.getRenderJobsUseCase.execute();

      const response: RenderJobListResponse = {
        jobs: jobs.map(toRenderJobResponse),
        total: jobs.length,
      };
      res.status(200).json(response);
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) || "Failed to get render jobs" });
    }
  }

  async getJob(req: Request, res: Response): Promise<void> {
    try {
      const jobId = Number(req.params.id);
      if (!Number.isInteger(jobId) || jobId < 1) {
        res.status(400).json({ error: "Job id must be a positive integer" });
        return;
      }

      const job = await this.getRenderJobUseCase.execute({ jobId });
      if (!job) {
        res.status(404).json({ error: "Render job not found" });
        return;
      }

      const response: RenderJobResponse = toRenderJobResponse(job);
      res.status(200).json(response);
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) || "Failed to get render job" });
    }
  }

  async getEncoderStatus(_req: Request, res: Response): Promise<void> {
    try {
      const status = await this.getEncoderStatusUseCase.execute();
      res.status(200).json(status);
    } catch (error) {
      res.status(500).json({ error: errorMessage(error) || "Failed to get encoder status" });
    }
  }
}
