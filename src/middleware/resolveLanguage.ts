// src/middleware/resolveLanguage.ts

import type { NextFunction, Request, Response } from "express";
import { negotiateLanguage } from "@/lib/i18n/translate";
import { setRequestContext } from "@/lib/observability/request-context";

/**
 * Picks the response language from Accept-Language. Unsupported or missing
 * headers leave the configured default in place.
 */
export function resolveLanguage(req: Request, res: Response, next: NextFunction) {
  const language = negotiateLanguage(req.headers["accept-language"]);

  if (language) {
    setRequestContext({ language });
    res.setHeader("Content-Language", language);
  }

  next();
}
