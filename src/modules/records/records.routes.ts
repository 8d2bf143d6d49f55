// src/modules/records/records.routes.ts
// Verb map for one resource, mounted at /v1/<resource>.

import { Router, type RequestHandler, type Router as ExpressRouter } from "express";
import type { ResourceDefinition } from "./record.definition";
import { RecordLifecycle } from "./record.lifecycle";
import { RecordSearch } from "./record.search";
import type { RecordMirror, RecordStore } from "./record.store";
import { RecordsController } from "./records.controller";
import type { RecordStatus } from "./record.constants";
import type { StatusPolicyConfig } from "./status.policy";

export type RecordRouterDeps = {
  store: RecordStore;
  mirror: RecordMirror | null;
  policy: StatusPolicyConfig;
  restrictedStatuses: readonly RecordStatus[];
  pageSize: number;
  clock?: () => Date;
  /** GET / on every resource answers with the service index. */
  index: RequestHandler;
};

export function createRecordRouter(
  resource: ResourceDefinition,
  deps: RecordRouterDeps,
): ExpressRouter {
  const lifecycle = new RecordLifecycle(resource, {
    store: deps.store,
    mirror: deps.mirror,
    policy: deps.policy,
    restrictedStatuses: deps.restrictedStatuses,
    clock: deps.clock,
  });

  const search = new RecordSearch(resource, {
    store: deps.store,
    mirror: deps.mirror,
    defaultPageSize: deps.pageSize,
  });

  const controller = new RecordsController(lifecycle, search);
  const router: ExpressRouter = Router();

  router.get("/", deps.index);
  router.post("/data", controller.search("primary"));
  router.post("/list", controller.search("mirror"));
  router.post("/view", controller.view());
  router.post("/create", controller.create());
  router.put("/update", controller.update());
  router.delete("/delete", controller.delete());

  return router;
}
