/**
 * Upload policies per file kind.
 */

export type UploadKind = 'profile-images' | 'receipts' | 'attachments'

export interface UploadPolicy {
  maxBytes: number
  /** MIME type → stored file extension */
  types: Record<string, string>
}

const MB = 1024 * 1024

export const UPLOAD_POLICIES: Record<UploadKind, UploadPolicy> = {
  'profile-images': {
    maxBytes: 5 * MB,
    types: {
      'image/jpeg': '.jpg',
      'image/png': '.png',
      'image/gif': '.gif',
      'image/webp': '.webp',
    },
  },
  receipts: {
    maxBytes: 10 * MB,
    types: {
      'image/jpeg': '.jpg',
      'image/png': '.png',
      'image/webp': '.webp',
      'image/heic': '.heic',
      'application/pdf': '.pdf',
    },
  },
  attachments: {
    maxBytes: 10 * MB,
    types: {
      'application/pdf': '.pdf',
      'application/msword': '.doc',
      'application/vnd.openxmlformats-officedocument.wordprocessingml.document': '.docx',
      'application/vnd.openxmlformats-officedocument.presentationml.presentation': '.pptx',
      'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': '.xlsx',
      'text/plain': '.txt',
      'image/jpeg': '.jpg',
      'image/png': '.png',
      'image/gif': '.gif',
    },
  },
}

/** Extension for an allowed MIME type, or null when the kind rejects it */
export function extensionFor(kind: UploadKind, mimeType: string): string | null {
  const normalized = mimeType.split(';')[0].trim().toLowerCase()
  return UPLOAD_POLICIES[kind].types[normalized] ?? null
}

export function allowedTypes(kind: UploadKind): string[] {
  return Object.keys(UPLOAD_POLICIES[kind].types)
}
