import type { Response } from "express";
import { ZodError } from "zod";
import type { AppContext, AppContextHolder } from "../context";
import { getErrorMessage } from "../errors";

/** Sends 503 and returns null until the context is attached. */
export function requireContext(holder: AppContextHolder, res: Response): AppContext | null {
  const context = holder.current;
  if (!context) {
    res.status(503).json({ ok: false, error: "Service not initialized" });
  }
  return context;
}

/** Request-shape failures are 400; anything the store or agent throws is 500. */
export function sendError(res: Response, error: unknown): void {
  if (error instanceof ZodError) {
    const detail = error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
    res.status(400).json({ ok: false, error: detail.join("; ") });
    return;
  }
  console.error(error);
  res.status(500).json({ ok: false, error: getErrorMessage(error) });
}
