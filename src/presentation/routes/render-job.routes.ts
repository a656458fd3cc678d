import { Router } from "express";
import multer from "multer";
import { basename, extname } from "path";
import type { RenderJobController } from "../controllers/render-job.controller";

const MAX_SOURCE_FILE_SIZE = 2 * 1024 * 1024 * 1024; // 2GB per source file

export function sourceFileName(fieldName: string, originalName: string, now: number = Date.now()): string {
  const extension = extname(originalName).toLowerCase().replace(/[^.a-z0-9]/g, "");
  const stem = basename(originalName, extname(originalName)).replace(/[^A-Za-z0-9_-]+/g, "_").slice(0, 60) || "source";
  return `${now}_${fieldName}_${stem}${extension}`;
}

function createSourceUpload(uploadDir: string) {
  return multer({
    storage: multer.diskStorage({
      destination: uploadDir,
      filename: (_req, file, cb) => {
        cb(null, sourceFileName(file.fieldname, file.originalname));
      },
    }),
    limits: {
      fileSize: MAX_SOURCE_FILE_SIZE,
    },
    fileFilter: (_req, file, cb) => {
      // Loop source must be a video; the external track may be audio or a video with sound
      if (file.fieldname === "video" && file.mimetype.startsWith("video/")) {
        cb(null, true);
      } else if (file.fieldname === "audio" && (file.mimetype.startsWith("audio/") || file.mimetype.startsWith("video/"))) {
        cb(null, true);
      } else {
        cb(new multer.MulterError("LIMIT_UNEXPECTED_FILE", file.fieldname));
      }
    },
  });
}

export function createRenderJobRoutes(renderJobController: RenderJobController, uploadDir: string): Router {
  const router = Router();
  const upload = createSourceUpload(uploadDir);

  // List all jobs, newest first
  router.get("/", (req, res) => renderJobController.getJobs(req, res));

  // Get one job with its log
  router.get("/:id", (req, res) => renderJobController.getJob(req, res));

  // Submit a job (multipart with `video`/`audio` files, or JSON with source paths)
  router.post(
    "/",
    upload.fields([
      { name: "video", maxCount: 1 },
      { name: "audio", maxCount: 1 },
    ]),
    (req, res) => renderJobController.submitJob(req, res)
  );

  return router;
}

export function createSystemRoutes(renderJobController: RenderJobController): Router {
  const router = Router();

  // ffmpeg / GPU availability and render queue load
  router.get("/encoder", (req, res) => renderJobController.getEncoderStatus(req, res));

  return router;
}
