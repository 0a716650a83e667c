import cors from "cors";
import express, { type ErrorRequestHandler } from "express";
import type { Server } from "http";
import type { AppContextHolder } from "./context";
import { documentsRouter } from "./routes/documents";
import { requireContext, sendError } from "./routes/http";
import { queryRouter } from "./routes/query";
import { searchRouter } from "./routes/search";

function isJsonParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

// Malformed JSON bodies arrive here from express.json()
const jsonErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (isJsonParseError(err)) {
    res.status(400).json({ ok: false, error: "Request body is not valid JSON" });
    return;
  }
  sendError(res, err);
};

export function createApp(holder: AppContextHolder): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "10mb" }));

  app.get("/", (_req, res) => {
    res.json({
      message: "Document retrieval API",
      endpoints: {
        "GET /health": "Service health and document count",
        "POST /query": "Answer a question with retrieved context",
        "POST /search": "Nearest documents for a query",
        "POST /documents": "Add documents",
        "DELETE /documents": "Delete the collection",
        "GET /stats": "Store and model settings",
      },
    });
  });

  app.get("/health", async (_req, res) => {
    const context = requireContext(holder, res);
    if (!context) return;
    try {
      const stats = await context.lock.withRead(() => context.store.stats());
      res.json({ status: "healthy", vector_store_documents: stats.documentCount });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/stats", async (_req, res) => {
    const context = requireContext(holder, res);
    if (!context) return;
    try {
      const { store, llm, config } = context;
      const stats = await context.lock.withRead(() => store.stats());
      res.json({
        vector_store: {
          collection_name: stats.collectionName,
          document_count: stats.documentCount,
          persist_dir: stats.persistDir,
          backend: store.backend,
          embedding_model: store.embeddingModel,
        },
        agent_config: {
          model: llm.model,
          ollama_url: llm.url,
          max_tokens: config.llm.maxTokens,
          temperature: config.llm.temperature,
        },
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.use("/query", queryRouter(holder));
  app.use("/search", searchRouter(holder));
  app.use("/documents", documentsRouter(holder));
  app.use(jsonErrorHandler);

  return app;
}

/** Resolves once the server is bound; bind failures such as EADDRINUSE reject. */
export function listen(app: express.Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = host === undefined ? app.listen(port) : app.listen(port, host);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
