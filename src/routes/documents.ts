import { Router } from "express";
import { z } from "zod";
import type { AppContextHolder } from "../context";
import { DocumentMetadataSchema } from "../utils/metadata";
import { requireContext, sendError } from "./http";

const AddDocumentsSchema = z
  .object({
    documents: z.array(z.string().min(1)).min(1),
    ids: z.array(z.string().min(1)).optional(),
    metadata: z.array(DocumentMetadataSchema).optional(),
  })
  .refine((body) => !body.ids || body.ids.length === body.documents.length, {
    message: "ids must have one entry per document",
    path: ["ids"],
  })
  .refine((body) => !body.metadata || body.metadata.length === body.documents.length, {
    message: "metadata must have one entry per document",
    path: ["metadata"],
  });

export function documentsRouter(holder: AppContextHolder): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    const context = requireContext(holder, res);
    if (!context) return;
    try {
      const { documents, ids, metadata } = AddDocumentsSchema.parse(req.body);
      const stats = await context.lock.withWrite(async () => {
        await context.store.add(documents, ids, metadata);
        return context.store.stats();
      });
      res.json({
        status: "success",
        documents_added: documents.length,
        total_documents: stats.documentCount,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete("/", async (_req, res) => {
    const context = requireContext(holder, res);
    if (!context) return;
    try {
      await context.lock.withWrite(() => context.store.deleteCollection());
      res.json({ status: "success", message: `Deleted collection ${context.store.collectionName}` });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
