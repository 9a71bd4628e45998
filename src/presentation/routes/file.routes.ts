import { Router } from "express";
import multer from "multer";
import { randomUUID } from "crypto";
import { tmpdir } from "os";
import { extname } from "path";
import { FileController } from "../controllers/file.controller";

export interface FileRoutesOptions {
  uploadTempDir?: string;
  maxUploadBytes: number;
}

export function createFileRoutes(fileController: FileController, options: FileRoutesOptions): Router {
  const router = Router();

  // Keep the original extension so type inference still works on the temp file
  const upload = multer({
    storage: multer.diskStorage({
      destination: options.uploadTempDir ?? tmpdir(),
      filename: (_req, file, cb) => cb(null, `${randomUUID()}${extname(file.originalname).toLowerCase()}`),
    }),
    limits: {
      fileSize: options.maxUploadBytes,
    },
  });

  router.get("/health", (req, res, next) => fileController.health(req, res, next));
  router.get("/validation-config", (req, res) => fileController.validationConfig(req, res));

  router.post("/upload", (req, res, next) => fileController.uploadFile(req, res, next));
  router.post("/upload/file", upload.single("file"), (req, res, next) =>
    fileController.uploadMultipart(req, res, next)
  );
  router.post("/upload-batch", (req, res, next) => fileController.uploadBatch(req, res, next));

  router.post("/query", (req, res, next) => fileController.query(req, res, next));

  router.get("/files", (req, res, next) => fileController.listFiles(req, res, next));
  router.get("/files/:id", (req, res, next) => fileController.getFile(req, res, next));
  router.delete("/files/:id", (req, res, next) => fileController.deleteFile(req, res, next));

  return router;
}
