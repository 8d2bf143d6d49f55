// src/middleware/resolveActor.ts
// Resolves the calling actor from a Bearer JWT and exposes it to handlers via res.locals.

import type { NextFunction, Request, Response } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import type { JwtAlgorithm } from "@/lib/config";
import { setRequestContext } from "@/lib/observability/request-context";
import { log, errorMeta } from "@/lib/observability/logger";
import { SYSTEM_ACTOR_NAME } from "@/modules/records/record.constants";
import { UnauthorizedError } from "@/modules/records/record.errors";
import type { ActorContext } from "@/modules/records/record.types";

export type ActorOptions = {
  secret: string | null;
  algorithm: JwtAlgorithm;
  /** When true, a request without Authorization runs as the system actor. */
  optional: boolean;
  /** Key under `user.roles` holding this application's roles. */
  appCode: string;
  privilegedRole: string;
};

const TokenPayloadSchema = z.object({
  user: z.object({
    username: z.string().min(1),
    roles: z.record(z.union([z.string(), z.array(z.string())])).optional(),
  }),
});

export const SYSTEM_ACTOR: ActorContext = Object.freeze({
  name: SYSTEM_ACTOR_NAME,
  roles: [],
  isPrivileged: false,
});

function rolesFor(
  roles: Record<string, string | string[]> | undefined,
  appCode: string,
): string[] {
  const entry = roles?.[appCode];
  if (entry === undefined) return [];
  const list = Array.isArray(entry) ? entry : entry.split(",");
  return list.map((role) => role.trim()).filter(Boolean);
}

/**
 * Verifies the token and maps its payload to an actor.
 * Any verification or shape failure is an UnauthorizedError.
 */
export function actorFromToken(token: string, options: ActorOptions): ActorContext {
  if (!options.secret) {
    throw new UnauthorizedError();
  }

  let decoded: unknown;
  try {
    decoded = jwt.verify(token, options.secret, { algorithms: [options.algorithm] });
  } catch (err) {
    log("WARN", "AUTH_TOKEN_REJECTED", errorMeta(err));
    throw new UnauthorizedError();
  }

  const payload = TokenPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    log("WARN", "AUTH_TOKEN_MALFORMED");
    throw new UnauthorizedError();
  }

  const roles = rolesFor(payload.data.user.roles, options.appCode);

  return {
    name: payload.data.user.username,
    roles,
    isPrivileged: roles.includes(options.privilegedRole),
  };
}

export function resolveActor(options: ActorOptions) {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization;

    try {
      let actor: ActorContext;

      if (!header) {
        if (!options.optional) throw new UnauthorizedError();
        actor = SYSTEM_ACTOR;
      } else {
        const match = /^Bearer\s+(\S+)$/i.exec(header);
        if (!match) throw new UnauthorizedError();
        actor = actorFromToken(match[1], options);
      }

      res.locals.actor = actor;
      setRequestContext({ actorName: actor.name });
      return next();
    } catch (err) {
      res.setHeader("WWW-Authenticate", "Bearer");
      return next(err);
    }
  };
}

function isActorContext(value: unknown): value is ActorContext {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "roles" in value &&
    Array.isArray(value.roles) &&
    "isPrivileged" in value &&
    typeof value.isPrivileged === "boolean"
  );
}

/** Actor set by resolveActor; a route mounted without it is a wiring error. */
export function actorOf(res: Response): ActorContext {
  const actor: unknown = res.locals.actor;
  if (!isActorContext(actor)) {
    throw new UnauthorizedError();
  }
  return actor;
}
