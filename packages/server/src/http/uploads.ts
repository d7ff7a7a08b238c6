/**
 * Multipart upload reader
 *
 * One file per request in the `file` field, checked against the upload policy
 * of its kind before it is buffered.
 */

import type { FastifyRequest } from "fastify";
import {
  FileTooLargeError,
  UPLOAD_POLICIES,
  UnsupportedFileTypeError,
  ValidationError,
  allowedTypes,
  extensionFor,
  type UploadKind,
} from "@homeroom/core";

export interface UploadedFile {
  buffer: Buffer;
  fileName: string;
  mimeType: string;
  extension: string;
  size: number;
}

function isFileTooLarge(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "FST_REQ_FILE_TOO_LARGE";
}

export async function readUpload(request: FastifyRequest, kind: UploadKind): Promise<UploadedFile> {
  if (!request.isMultipart()) {
    throw ValidationError.field("file", "Request must be multipart/form-data");
  }

  const policy = UPLOAD_POLICIES[kind];
  const part = await request.file({ limits: { fileSize: policy.maxBytes, files: 1 } });
  if (!part) {
    throw ValidationError.field("file", "A file is required");
  }
  if (part.fieldname !== "file") {
    part.file.resume();
    throw ValidationError.field("file", "Upload the file in the 'file' field");
  }

  const extension = extensionFor(kind, part.mimetype);
  if (!extension) {
    part.file.resume();
    throw new UnsupportedFileTypeError(part.mimetype, allowedTypes(kind));
  }

  let buffer: Buffer;
  try {
    buffer = await part.toBuffer();
  } catch (err) {
    if (isFileTooLarge(err)) throw new FileTooLargeError(policy.maxBytes);
    throw err;
  }
  if (part.file.truncated) {
    throw new FileTooLargeError(policy.maxBytes);
  }
  if (buffer.length === 0) {
    throw ValidationError.field("file", "File is empty");
  }

  return {
    buffer,
    fileName: part.filename || `upload${extension}`,
    mimeType: part.mimetype.split(";")[0].trim().toLowerCase(),
    extension,
    size: buffer.length,
  };
}
