import { Router } from "express";
import { z } from "zod";
import type { AppContextHolder } from "../context";
import { requireContext, sendError } from "./http";

const QuerySchema = z.object({
  query: z.string().min(1),
  use_context: z.boolean().optional().default(true),
  n_results: z.number().int().min(1).max(50).optional().default(3),
});

export function queryRouter(holder: AppContextHolder): Router {
  const router = Router();

  router.post("/", async (req, res) => {
    const context = requireContext(holder, res);
    if (!context) return;
    try {
      const { query, use_context, n_results } = QuerySchema.parse(req.body);
      const { agent, lock } = context;

      // The lock covers retrieval only; generation can take minutes.
      const retrieval = use_context ? await lock.withRead(() => agent.retrieve(query, n_results)) : null;
      const result = await agent.answer(query, retrieval);

      res.json({
        query: result.query,
        response: result.response,
        retrieved_documents: result.retrievedDocuments,
        context_used: result.contextUsed,
        model: result.model,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
