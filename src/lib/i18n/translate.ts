// src/lib/i18n/translate.ts
// Message tables keyed by language; placeholders use {name}.

import en from "./en.json";
import id from "./id.json";
import { getRequestLanguage } from "@/lib/observability/request-context";

export type MessageKey = keyof typeof en;

const TABLES: Record<string, Record<MessageKey, string>> = { en, id };

export const SUPPORTED_LANGUAGES = Object.keys(TABLES);

let defaultLanguage = "en";

export function setDefaultLanguage(language: string): void {
  if (language in TABLES) defaultLanguage = language;
}

export function translate(
  key: MessageKey,
  params: Record<string, string | number> = {},
  language?: string,
): string {
  const lang = language ?? getRequestLanguage() ?? defaultLanguage;
  const table = TABLES[lang] ?? TABLES[defaultLanguage] ?? en;
  const template = table[key] ?? en[key];

  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    name in params ? String(params[name]) : match,
  );
}

/**
 * Picks the first supported language from an Accept-Language header.
 */
export function negotiateLanguage(header: string | undefined): string | undefined {
  if (!header) return undefined;

  const candidates = header
    .split(",")
    .map((part) => {
      const [tag, ...attrs] = part.trim().split(";");
      const q = attrs.find((a) => a.trim().startsWith("q="));
      return {
        lang: tag.trim().toLowerCase().split("-")[0],
        q: q ? Number(q.trim().slice(2)) : 1,
      };
    })
    .filter((c) => c.lang.length > 0 && Number.isFinite(c.q))
    .sort((a, b) => b.q - a.q);

  return candidates.find((c) => c.lang in TABLES)?.lang;
}
