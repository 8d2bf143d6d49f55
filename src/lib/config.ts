// src/lib/config.ts
// Purpose: Environment parsed once at startup into a typed, read-only configuration.

import { readFileSync } from "fs";
import { z } from "zod";
import {
  RESTRICTED_STATUSES,
  statusFromName,
  type RecordStatus,
} from "@/modules/records/record.constants";
import {
  DEFAULT_STATUS_POLICY,
  parseStatusPolicy,
  type StatusPolicyConfig,
} from "@/modules/records/status.policy";

export const SERVICE_INFO = {
  title: "Record Lifecycle API",
  version: "1.0.0",
} as const;

const BooleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const StatusList = z.string().transform((value, ctx) => {
  const statuses: RecordStatus[] = [];
  for (const name of value.split(",").map((part) => part.trim()).filter(Boolean)) {
    const status = statusFromName(name);
    if (status === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown status "${name}"`,
      });
      return z.NEVER;
    }
    statuses.push(status);
  }
  return statuses;
});

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3001),
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    DATABASE_URL: z.string().min(1).default("postgres://localhost:5432/records"),
    MONGODB_URL: z.string().min(1).optional(),
    MONGODB_DATABASE: z.string().min(1).default("records"),
    JWT_SECRET: z.string().min(1).optional(),
    JWT_ALGORITHM: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
    JWT_OPTIONAL: BooleanFlag.default("false"),
    CORS_ORIGIN: z.string().default("*"),
    PAGE_SIZE: z.coerce.number().int().positive().default(10),
    DEFAULT_LANGUAGE: z.enum(["en", "id"]).default("en"),
    PRIVILEGED_ROLE: z.string().min(1).default("superadmin"),
    APP_CODE: z.string().min(1).default("app"),
    STATUS_POLICY_FILE: z.string().min(1).optional(),
    RESTRICTED_STATUSES: StatusList.optional(),
    ENABLE_MIRROR_RESYNC: BooleanFlag.default("true"),
    MIRROR_RESYNC_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  })
  .superRefine((env, ctx) => {
    if (!env.JWT_OPTIONAL && !env.JWT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["JWT_SECRET"],
        message: "JWT_SECRET is required unless JWT_OPTIONAL=true",
      });
    }
  });

export type JwtAlgorithm = "HS256" | "HS384" | "HS512";

export type AppConfig = {
  port: number;
  nodeEnv: "development" | "test" | "production";
  isProduction: boolean;
  databaseUrl: string;
  mongo: { url: string; database: string } | null;
  jwt: { secret: string | null; algorithm: JwtAlgorithm; optional: boolean };
  corsOrigin: string;
  pageSize: number;
  defaultLanguage: "en" | "id";
  privilegedRole: string;
  appCode: string;
  statusPolicy: StatusPolicyConfig;
  restrictedStatuses: readonly RecordStatus[];
  mirrorResync: { enabled: boolean; intervalMs: number };
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadStatusPolicy(path: string | undefined): StatusPolicyConfig {
  if (!path) return DEFAULT_STATUS_POLICY;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(
      `Cannot read status policy file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  try {
    return parseStatusPolicy(raw);
  } catch (err) {
    throw new ConfigError(
      `Invalid status policy file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment: ${details}`);
  }

  const e = parsed.data;

  return Object.freeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    isProduction: e.NODE_ENV === "production",
    databaseUrl: e.DATABASE_URL,
    mongo: e.MONGODB_URL ? { url: e.MONGODB_URL, database: e.MONGODB_DATABASE } : null,
    jwt: {
      secret: e.JWT_SECRET ?? null,
      algorithm: e.JWT_ALGORITHM,
      optional: e.JWT_OPTIONAL,
    },
    corsOrigin: e.CORS_ORIGIN,
    pageSize: e.PAGE_SIZE,
    defaultLanguage: e.DEFAULT_LANGUAGE,
    privilegedRole: e.PRIVILEGED_ROLE,
    appCode: e.APP_CODE,
    statusPolicy: loadStatusPolicy(e.STATUS_POLICY_FILE),
    restrictedStatuses: e.RESTRICTED_STATUSES ?? RESTRICTED_STATUSES,
    mirrorResync: {
      enabled: e.ENABLE_MIRROR_RESYNC,
      intervalMs: e.MIRROR_RESYNC_INTERVAL_MS,
    },
  });
}
