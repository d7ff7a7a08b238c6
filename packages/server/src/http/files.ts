import path from "node:path";
import type { FastifyReply } from "fastify";
import { NotFoundError } from "@homeroom/core";
import type { FileStore } from "../storage/file-store.js";

export interface StoredFile {
  path: string;
  fileName: string;
  mimeType: string;
}

/**
 * `attachment; filename="..."; filename*=UTF-8''...` with an ASCII fallback
 * for clients that ignore the extended form
 */
export function contentDisposition(fileName: string, disposition: "attachment" | "inline" = "attachment"): string {
  const fallback = fileName.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_") || "download";
  return `${disposition}; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
}

/**
 * Stream a stored upload through @fastify/static. Files only leave the server
 * through authenticated routes that call this.
 */
export function sendStoredFile(
  reply: FastifyReply,
  files: FileStore,
  file: StoredFile,
  disposition: "attachment" | "inline" = "attachment",
): FastifyReply {
  if (!files.exists(file.path)) {
    throw new NotFoundError("File");
  }
  reply.header("Content-Disposition", contentDisposition(file.fileName, disposition));
  reply.header("Cache-Control", "private, no-store");
  reply.type(file.mimeType);
  return reply.sendFile(file.path);
}

const IMAGE_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

/** Profile images keep no client metadata; name and type follow the stored extension */
export function profileImageFile(storedPath: string): StoredFile {
  const extension = path.extname(storedPath).toLowerCase();
  return {
    path: storedPath,
    fileName: `profile-image${extension}`,
    mimeType: IMAGE_TYPES[extension] ?? "application/octet-stream",
  };
}
