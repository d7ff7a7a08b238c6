/**
 * Attachment routes shared by assignments and lesson plans:
 * upload, download and delete under `<collection>/:id/attachments`.
 */

import type { FastifyInstance, FastifyRequest } from "fastify";
import type { Attachment, AttachmentOwner } from "../attachments/attachment-manager.js";
import { ok } from "../http/envelope.js";
import { sendStoredFile } from "../http/files.js";
import { readUpload } from "../http/uploads.js";

export type AttachmentAccess = "read" | "write";

export interface AttachmentRouteOptions {
  /** e.g. `/assignments` */
  collection: string;
  /** Resolve the parent, throwing when the caller may not use it that way */
  ownerFor: (request: FastifyRequest, id: string, access: AttachmentAccess) => AttachmentOwner;
}

export function toAttachmentResponse(collection: string, parentId: string, attachment: Attachment) {
  return {
    id: attachment.id,
    file_name: attachment.fileName,
    mime_type: attachment.mimeType,
    size_bytes: attachment.sizeBytes,
    url: `/api/v1${collection}/${parentId}/attachments/${attachment.id}`,
    created_at: attachment.createdAt.toISOString(),
  };
}

export async function registerAttachmentRoutes(
  fastify: FastifyInstance,
  options: AttachmentRouteOptions,
): Promise<void> {
  const { collection, ownerFor } = options;

  fastify.post<{ Params: { id: string } }>(
    `${collection}/:id/attachments`,
    { config: { rateLimit: "uploads" } },
    async (request, reply) => {
      const owner = ownerFor(request, request.params.id, "write");
      const upload = await readUpload(request, "attachments");
      const storagePath = await fastify.fileStore.save(
        "attachments",
        request.teacherId,
        upload.extension,
        upload.buffer,
      );
      const attachment = fastify.attachmentManager.add(request.teacherId, owner, {
        fileName: upload.fileName,
        mimeType: upload.mimeType,
        sizeBytes: upload.size,
        storagePath,
      });
      return reply.code(201).send(ok(toAttachmentResponse(collection, owner.id, attachment)));
    },
  );

  fastify.get<{ Params: { id: string; attachmentId: string } }>(
    `${collection}/:id/attachments/:attachmentId`,
    async (request, reply) => {
      const owner = ownerFor(request, request.params.id, "read");
      const attachment = fastify.attachmentManager.get(owner, request.params.attachmentId);
      return sendStoredFile(reply, fastify.fileStore, {
        path: attachment.storagePath,
        fileName: attachment.fileName,
        mimeType: attachment.mimeType,
      });
    },
  );

  fastify.delete<{ Params: { id: string; attachmentId: string } }>(
    `${collection}/:id/attachments/:attachmentId`,
    async (request, reply) => {
      const owner = ownerFor(request, request.params.id, "write");
      const storagePath = fastify.attachmentManager.remove(owner, request.params.attachmentId);
      await fastify.fileStore.remove(storagePath);
      return reply.code(204).send();
    },
  );
}
