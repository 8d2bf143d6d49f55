// src/modules/records/records.controller.ts
// Purpose: HTTP adapter for one record resource. Lifecycle and search own all validation.

import type { NextFunction, Request, Response } from "express";
import { actorOf } from "@/middleware/resolveActor";
import type { ActorContext } from "./record.types";
import type { RecordLifecycle } from "./record.lifecycle";
import type { RecordSearch, SearchBackend } from "./record.search";

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

type Action = (params: unknown, actor: ActorContext) => Promise<{ code: number }>;

/** JSON body when one was sent; otherwise the query string. */
function paramsOf(req: Request): unknown {
  const body: unknown = req.body;
  const hasBody =
    typeof body === "object" && body !== null && Object.keys(body).length > 0;
  return hasBody ? body : req.query;
}

function handle(action: Action): Handler {
  return async (req, res, next) => {
    try {
      const envelope = await action(paramsOf(req), actorOf(res));
      res.status(envelope.code).json(envelope);
    } catch (err) {
      next(err);
    }
  };
}

export class RecordsController {
  constructor(
    private readonly lifecycle: RecordLifecycle,
    private readonly searcher: RecordSearch,
  ) {}

  search(backend: SearchBackend): Handler {
    return handle((params) => this.searcher.search(params, backend));
  }

  view(): Handler {
    return handle((params, actor) => this.lifecycle.view(params, actor));
  }

  create(): Handler {
    return handle((params, actor) => this.lifecycle.create(params, actor));
  }

  update(): Handler {
    return handle((params, actor) => this.lifecycle.update(params, actor));
  }

  delete(): Handler {
    return handle((params, actor) => this.lifecycle.delete(params, actor));
  }
}
