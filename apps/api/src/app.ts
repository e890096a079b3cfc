import { randomUUID } from "crypto";
import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type { Logger } from "pino";
import pinoHttp from "pino-http";
import { HOOK_TYPES, SECTORS, type GenerateReelResponse } from "@reelgen/schemas";
import type { Settings } from "./config";
import { toHttpError } from "./http-errors";
import { parseGenerateReelBody } from "./input";
import type { RetrievalService } from "./rag/retrieve";
import type { ScriptGenerator } from "./services/generator";

export const SERVICE_NAME = "reel-script-engine";

export type AppDeps = {
  generator: Pick<ScriptGenerator, "generate">;
  retrieval: Pick<RetrievalService, "stats" | "rebuild">;
  logger: Logger;
  settings: Pick<Settings, "adminToken">;
  version?: string;
};

function requestIdFrom(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  const trimmed = value?.trim();
  return trimmed && /^[\w.:-]{1,128}$/.test(trimmed) ? trimmed : undefined;
}

function bodyParserErrorType(err: unknown): string | undefined {
  if (err && typeof err === "object" && "type" in err && typeof err.type === "string")
    return err.type;
  return undefined;
}

export function createApp(deps: AppDeps) {
  const { generator, retrieval, logger, settings } = deps;
  const app = express();
  app.disable("x-powered-by");
  app.use(cors());
  app.use(
    pinoHttp({
      logger,
      genReqId: (req, res) => {
        const id = requestIdFrom(req.headers["x-request-id"]) ?? randomUUID();
        res.setHeader("X-Request-Id", id);
        return id;
      },
      customLogLevel: (_req, res, err) => {
        if (res.statusCode >= 500 || err) return "error";
        if (res.statusCode >= 400) return "warn";
        return "info";
      },
    }),
  );
  app.use(express.json({ limit: "1mb" }));

  app.get("/", (_req: Request, res: Response) =>
    res.json({
      service: SERVICE_NAME,
      version: deps.version ?? "0.1.0",
      endpoints: {
        generate: "POST /generate-reel",
        health: "GET /health",
        sectors: "GET /sectors",
        hook_types: "GET /hook-types",
      },
    }),
  );

  app.get("/health", (_req: Request, res: Response) => {
    const stats = retrieval.stats;
    res.json({
      ok: true,
      status: "healthy",
      service: SERVICE_NAME,
      index: { documents: stats.documents, built_at: stats.built_at },
    });
  });

  app.get("/sectors", (_req: Request, res: Response) => res.json({ sectors: SECTORS }));
  app.get("/hook-types", (_req: Request, res: Response) => res.json({ hook_types: HOOK_TYPES }));

  app.post("/generate-reel", async (req: Request, res: Response) => {
    try {
      const { brand, request } = parseGenerateReelBody(req.body);
      const requestId = String(req.id);
      const outcome = await generator.generate(brand, request, { requestId, logger: req.log });
      const payload: GenerateReelResponse = {
        script: outcome.script,
        validation: outcome.validation,
        metadata: {
          brand: brand.brand_name,
          sector: brand.sector,
          goal: request.goal,
          hook_type: request.hook_type,
          script_length: request.script_length,
          generation_attempts: outcome.attempts,
          examples_used: outcome.examples.map((e) => e.id),
          model: outcome.model,
          request_id: requestId,
        },
      };
      res.json(payload);
    } catch (err) {
      const { status, body } = toHttpError(err, "generate_reel_failed");
      if (status >= 500) req.log.error({ err }, "generate_reel.failed");
      else req.log.warn({ details: body.details }, "generate_reel.rejected");
      res.status(status).json(body);
    }
  });

  app.post("/admin/reindex", async (req: Request, res: Response) => {
    if (!settings.adminToken) return res.status(404).json({ error: "not_found" });
    const auth = req.header("authorization") || "";
    const m = auth.match(/^Bearer\s+(.+)$/i);
    if (!m || m[1].trim() !== settings.adminToken)
      return res.status(401).json({ error: "unauthorized" });
    try {
      await retrieval.rebuild();
      const stats = retrieval.stats;
      req.log.info({ documents: stats.documents }, "admin.reindex.done");
      return res.json({ ok: true, index: { documents: stats.documents, built_at: stats.built_at } });
    } catch (err) {
      req.log.error({ err }, "admin.reindex.failed");
      const { status, body } = toHttpError(err, "reindex_failed");
      return res.status(status).json(body);
    }
  });

  app.use((_req: Request, res: Response) => res.status(404).json({ error: "not_found" }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const type = bodyParserErrorType(err);
    if (type === "entity.parse.failed") return res.status(400).json({ error: "invalid_json" });
    if (type === "entity.too.large") return res.status(413).json({ error: "payload_too_large" });
    req.log.error({ err }, "unhandled_error");
    return res.status(500).json({ error: "internal_error" });
  });

  return app;
}
