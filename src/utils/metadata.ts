import { z } from "zod";
import type { DocumentMetadata } from "../types";

export const MetadataValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const DocumentMetadataSchema = z.record(z.string(), MetadataValueSchema);

/** Keeps the primitive entries of an index-provided metadata object. */
export function toDocumentMetadata(value: unknown): DocumentMetadata {
  const metadata: DocumentMetadata = {};
  if (!value || typeof value !== "object") return metadata;
  for (const [key, entry] of Object.entries(value)) {
    const parsed = MetadataValueSchema.safeParse(entry);
    if (parsed.success) metadata[key] = parsed.data;
  }
  return metadata;
}
