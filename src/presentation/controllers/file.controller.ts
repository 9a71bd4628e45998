import { NextFunction, Request, Response } from "express";
import { rm } from "fs/promises";
import { FileValidationService } from "../../application/services/file.validation.service";
import { VectorStoreService } from "../../application/services/vector.store.service";
import {
  toBatchUploadResponse,
  toFileInfoResponse,
  toHealthResponse,
  toQueryResponse,
  toUploadFileResponse,
  toValidationConfigResponse,
} from "../dto/file.dto";
import {
  parseBatchUploadRequest,
  parseCallerMetadata,
  parseFlag,
  parseLimit,
  parseQueryRequest,
  parseUploadRequest,
} from "../dto/request.parser";

export class FileController {
  constructor(
    private vectorStoreService: VectorStoreService,
    private fileValidationService: FileValidationService
  ) {}

  async health(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const report = await this.vectorStoreService.health();
      res.status(report.status === "healthy" ? 200 : 503).json(toHealthResponse(report));
    } catch (error) {
      next(error);
    }
  }

  validationConfig(_req: Request, res: Response): void {
    res.status(200).json(toValidationConfigResponse(this.fileValidationService.describeRules()));
  }

  async uploadFile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { path, ...options } = parseUploadRequest(req.body);
      const uploaded = await this.vectorStoreService.upload(path, options);
      res.status(201).json(toUploadFileResponse(uploaded));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Multipart upload. The file lands in a temp file that is removed afterwards.
   */
  async uploadMultipart(req: Request, res: Response, next: NextFunction): Promise<void> {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: "No file uploaded (expected multipart field 'file')" });
      return;
    }

    try {
      const uploaded = await this.vectorStoreService.upload(file.path, {
        fileName: file.originalname,
        contentType: file.mimetype,
        temporaryPath: true,
        metadata: parseCallerMetadata(req.body?.metadata),
      });
      res.status(201).json(toUploadFileResponse(uploaded));
    } catch (error) {
      next(error);
    } finally {
      await this.removeTempFile(file.path);
    }
  }

  async uploadBatch(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const items = parseBatchUploadRequest(req.body);
      const result = await this.vectorStoreService.uploadBatch(items);
      res.status(200).json(toBatchUploadResponse(result));
    } catch (error) {
      next(error);
    }
  }

  async query(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const request = parseQueryRequest(req.body);
      const result = await this.vectorStoreService.query(request);
      res.status(200).json(toQueryResponse(result, parseFlag(req.query.include_vector)));
    } catch (error) {
      next(error);
    }
  }

  async listFiles(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const files = await this.vectorStoreService.list(parseLimit(req.query.limit));
      res.status(200).json({ files: files.map(toFileInfoResponse), total: files.length });
    } catch (error) {
      next(error);
    }
  }

  async getFile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const file = await this.vectorStoreService.get(req.params.id);
      if (!file) {
        res.status(404).json({ error: `File not found: ${req.params.id}` });
        return;
      }
      res.status(200).json(toFileInfoResponse(file));
    } catch (error) {
      next(error);
    }
  }

  async deleteFile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const fileId = req.params.id;
      const outcome = await this.vectorStoreService.delete(fileId);
      switch (outcome) {
        case "deleted":
          res.status(200).json({ file_id: fileId, deleted: true });
          return;
        case "not_found":
          res.status(404).json({ error: `File not found: ${fileId}` });
          return;
        case "not_supported":
          res.status(501).json({ error: "Vector deletion is not supported by this backend", file_id: fileId });
          return;
      }
    } catch (error) {
      next(error);
    }
  }

  private async removeTempFile(filePath: string): Promise<void> {
    try {
      await rm(filePath, { force: true });
    } catch (error) {
      console.warn(`[FileController] Failed to remove temp file ${filePath}:`, error);
    }
  }
}
