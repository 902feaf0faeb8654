import { randomBytes } from "node:crypto";
import fs from "node:fs";
import type { RequestHandler } from "express";
import multer from "multer";

export interface UploadParserOptions {
  stagingDirectory: string;
  maxUploadBytes: number;
}

export const UPLOAD_FIELD_NAME = "file";

/**
 * Streams the single multipart file field to the staging directory. The
 * staged file is moved into the tenant's directory by the upload operation.
 */
export function createUploadParser(options: UploadParserOptions): RequestHandler {
  const upload = multer({
    storage: multer.diskStorage({
      destination: (_request, _file, callback) => {
        fs.mkdir(options.stagingDirectory, { recursive: true }, (error) => {
          callback(error ?? null, options.stagingDirectory);
        });
      },
      filename: (_request, _file, callback) => {
        callback(null, `upload-${Date.now()}-${randomBytes(8).toString("hex")}.part`);
      }
    }),
    limits: {
      fileSize: options.maxUploadBytes,
      files: 1
    }
  });

  return upload.single(UPLOAD_FIELD_NAME);
}
