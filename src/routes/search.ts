import { Router } from "express";
import { z } from "zod";
import type { AppContextHolder } from "../context";
import { requireContext, sendError } from "./http";

export const SearchSchema = z.object({
  query: z.string().min(1),
  n_results: z.number().int().min(1).max(50).optional().default(3),
});

export function searchRouter(holder: AppContextHolder): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    const context = requireContext(holder, res);
    if (!context) return;
    try {
      const { query, n_results } = SearchSchema.parse(req.body);
      const hits = await context.lock.withRead(() => context.store.search(query, n_results));
      res.json({
        query,
        results: hits.map((hit) => ({
          id: hit.id,
          document: hit.document,
          distance: hit.distance,
          metadata: hit.metadata,
        })),
        count: hits.length,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
