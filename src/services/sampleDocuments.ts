import { z } from "zod";
import sampleDocuments from "../../data/sample_documents.json";
import type { DocumentMetadata } from "../types";
import type { DocumentStore } from "./documentStore";

const SampleDocumentsSchema = z.array(z.string().min(1)).min(1);

export const SAMPLE_METADATA: DocumentMetadata = { source: "sample", type: "general_info" };

export function sampleDocumentId(index: number): string {
  return `sample_doc_${index}`;
}

/**
 * Adds the bundled sample documents that are not in the store yet and returns
 * how many were added.
 */
export async function loadSampleDocuments(store: DocumentStore): Promise<number> {
  const documents = SampleDocumentsSchema.parse(sampleDocuments);
  const ids = documents.map((_, i) => sampleDocumentId(i));
  const present = new Set(await store.findExistingIds(ids));

  const missing = ids.map((id, i) => ({ id, text: documents[i] })).filter((d) => !present.has(d.id));
  if (missing.length === 0) {
    return 0;
  }

  await store.add(
    missing.map((d) => d.text),
    missing.map((d) => d.id),
    missing.map(() => ({ ...SAMPLE_METADATA }))
  );
  return missing.length;
}
