import type { PageMeta } from "@homeroom/core";

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
  meta?: PageMeta;
}

export function ok<T>(data: T, meta?: PageMeta): SuccessEnvelope<T> {
  return meta ? { success: true, data, meta } : { success: true, data };
}
