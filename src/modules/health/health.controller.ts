// src/modules/health/health.controller.ts
// Service index and health endpoints with graceful degradation.

import { Router, type Request, type RequestHandler, type Response } from "express";
import { getRequestLanguage } from "@/lib/observability/request-context";
import { errorMeta, log } from "@/lib/observability/logger";
import { success } from "@/modules/records/response.envelope";

export type ServiceInfo = {
  title: string;
  version: string;
  environment: string;
  defaultLanguage: string;
};

/** Named storage checks; each rejects when its backend is unreachable. */
export type HealthProbes = Record<string, () => Promise<void>>;

export function serviceIndex(info: ServiceInfo): RequestHandler {
  return (_req: Request, res: Response) => {
    const data: Record<string, string> = {
      language: getRequestLanguage() ?? info.defaultLanguage,
      version: info.version,
    };

    if (info.environment === "development") {
      data.environment = info.environment;
    }

    res.status(200).json(success(data, `${info.title} ${info.version}`));
  };
}

export function createHealthRouter(info: ServiceInfo, probes: HealthProbes = {}): Router {
  const router: Router = Router();

  ////////////////////////////////////////////////////////////////
  // Service index
  ////////////////////////////////////////////////////////////////

  router.get("/", serviceIndex(info));

  ////////////////////////////////////////////////////////////////
  // Service health
  ////////////////////////////////////////////////////////////////

  router.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "online",
      mode: info.environment,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  ////////////////////////////////////////////////////////////////
  // Storage health
  ////////////////////////////////////////////////////////////////

  router.get("/health/storage", async (_req: Request, res: Response) => {
    const checks: Record<string, "ok" | "unavailable"> = {};

    for (const [name, probe] of Object.entries(probes)) {
      try {
        await probe();
        checks[name] = "ok";
      } catch (err) {
        // never leak driver errors from health endpoints
        log("WARN", "HEALTH_PROBE_FAILED", { probe: name, ...errorMeta(err) });
        checks[name] = "unavailable";
      }
    }

    const ok = Object.values(checks).every((state) => state === "ok");

    res.status(ok ? 200 : 503).json({
      ok,
      checks,
      checkedAt: new Date().toISOString(),
    });
  });

  return router;
}
