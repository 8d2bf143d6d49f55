// src/app.ts
// Purpose: Express application factory with request correlation, structured logging and the envelope error surface.

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import cors from "cors";
import { randomUUID } from "crypto";

import type { AppConfig } from "@/lib/config";
import { SERVICE_INFO } from "@/lib/config";
import { setDefaultLanguage, translate } from "@/lib/i18n/translate";
import { withRequestContext } from "@/lib/observability/request-context";
import { errorMeta, log } from "@/lib/observability/logger";
import { DomainError } from "@/lib/errors/domain-error";
import { resolveActor } from "@/middleware/resolveActor";
import { resolveLanguage } from "@/middleware/resolveLanguage";
import {
  createHealthRouter,
  serviceIndex,
  type HealthProbes,
  type ServiceInfo,
} from "@/modules/health/health.controller";
import type { ResourceDefinition } from "@/modules/records/record.definition";
import type { RecordMirror, RecordStore } from "@/modules/records/record.store";
import { createRecordRouter } from "@/modules/records/records.routes";
import {
  errorEnvelope,
  fromUnknownError,
} from "@/modules/records/response.envelope";

export type AppDeps = {
  config: AppConfig;
  resources: readonly ResourceDefinition[];
  store: RecordStore;
  mirror: RecordMirror | null;
  probes?: HealthProbes;
  clock?: () => Date;
};

function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export function createApp(deps: AppDeps): Express {
  const { config } = deps;
  const app: Express = express();

  setDefaultLanguage(config.defaultLanguage);

  // Dynamic record data must not be answered with 304s
  app.set("etag", false);

  ////////////////////////////////////////////////////////////////
  // Correlation + structured logging middleware
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, res: Response, next: NextFunction) => {
    const header = req.headers["x-request-id"];
    const requestId = typeof header === "string" && header ? header : randomUUID();

    res.setHeader("x-request-id", requestId);

    const start = Date.now();

    void withRequestContext(async () => {
      log("INFO", "HTTP_REQUEST_STARTED", {
        method: req.method,
        path: req.originalUrl,
      });

      res.on("finish", () => {
        log("INFO", "HTTP_REQUEST_COMPLETED", {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start,
        });
      });

      next();
    }, requestId);
  });

  app.use(resolveLanguage);

  ////////////////////////////////////////////////////////////////
  // CORS + body parsing
  ////////////////////////////////////////////////////////////////

  app.use(
    cors({
      origin: config.corsOrigin === "*" ? true : config.corsOrigin.split(","),
      credentials: true,
      methods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowedHeaders: [
        "Content-Type",
        "Authorization",
        "Accept-Language",
        "X-Request-Id",
      ],
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  ////////////////////////////////////////////////////////////////
  // Service routes
  ////////////////////////////////////////////////////////////////

  const info: ServiceInfo = {
    title: SERVICE_INFO.title,
    version: SERVICE_INFO.version,
    environment: config.nodeEnv,
    defaultLanguage: config.defaultLanguage,
  };

  app.use(createHealthRouter(info, deps.probes));

  ////////////////////////////////////////////////////////////////
  // Resource routes
  ////////////////////////////////////////////////////////////////

  app.use(
    "/v1",
    resolveActor({
      secret: config.jwt.secret,
      algorithm: config.jwt.algorithm,
      optional: config.jwt.optional,
      appCode: config.appCode,
      privilegedRole: config.privilegedRole,
    }),
  );

  for (const resource of deps.resources) {
    app.use(
      `/v1/${resource.name}`,
      createRecordRouter(resource, {
        store: deps.store,
        mirror: deps.mirror,
        policy: config.statusPolicy,
        restrictedStatuses: config.restrictedStatuses,
        pageSize: config.pageSize,
        clock: deps.clock,
        index: serviceIndex(info),
      }),
    );
  }

  ////////////////////////////////////////////////////////////////
  // 404 fallback
  ////////////////////////////////////////////////////////////////

  app.use((_req: Request, res: Response) => {
    res.status(404).json(errorEnvelope(404, translate("routeNotFound")));
  });

  ////////////////////////////////////////////////////////////////
  // Global error handler (must be last)
  ////////////////////////////////////////////////////////////////

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      return res.status(400).json(errorEnvelope(400, translate("badRequest")));
    }

    if (!(err instanceof DomainError)) {
      log("ERROR", "HTTP_REQUEST_FAILED", {
        ...errorMeta(err),
        stack: config.isProduction || !(err instanceof Error) ? undefined : err.stack,
      });
    }

    const envelope = fromUnknownError(err, !config.isProduction);
    return res.status(envelope.code).json(envelope);
  });

  return app;
}
