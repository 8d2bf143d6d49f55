// src/server.ts
// Purpose: Process bootstrap: config, storage connections, HTTP server, mirror resync scheduler, graceful shutdown.

import http from "http";
import { createApp } from "./app";
import { ConfigError, loadConfig } from "@/lib/config";
import { advisoryLock, createPool, MIRROR_RESYNC_LOCK_KEY, sqlClient } from "@/lib/db";
import { connectMirror, type MirrorConnection } from "@/lib/mongo";
import { errorMeta, log } from "@/lib/observability/logger";
import { RESOURCES } from "@/resources";
import { MongoRecordMirror } from "@/modules/records/mongo.record.mirror";
import { MirrorResyncJob } from "@/modules/records/mirrorResync.job";
import { MirrorResyncScheduler } from "@/modules/records/mirrorResync.scheduler";
import { PgRecordStore } from "@/modules/records/pg.record.store";
import type { HealthProbes } from "@/modules/health/health.controller";

async function main(): Promise<void> {
  ////////////////////////////////////////////////////////////////
  // Environment
  ////////////////////////////////////////////////////////////////

  const config = loadConfig();

  ////////////////////////////////////////////////////////////////
  // Storage
  ////////////////////////////////////////////////////////////////

  const pool = createPool(config.databaseUrl);
  const store = new PgRecordStore(sqlClient(pool));

  const probes: HealthProbes = {
    primary: async () => {
      await pool.query("SELECT 1");
    },
  };

  let mirrorConnection: MirrorConnection | null = null;
  if (config.mongo) {
    mirrorConnection = await connectMirror(config.mongo.url, config.mongo.database);
    const db = mirrorConnection.db;
    probes.mirror = async () => {
      await db.command({ ping: 1 });
    };
  }

  const mirror = mirrorConnection ? new MongoRecordMirror(mirrorConnection.db) : null;

  ////////////////////////////////////////////////////////////////
  // HTTP server
  ////////////////////////////////////////////////////////////////

  const app = createApp({ config, resources: RESOURCES, store, mirror, probes });
  const server = http.createServer(app);

  ////////////////////////////////////////////////////////////////
  // Mirror resync scheduler
  ////////////////////////////////////////////////////////////////

  const scheduler = mirror
    ? new MirrorResyncScheduler(
        new MirrorResyncJob({ store, mirror, resources: RESOURCES }),
        {
          intervalMs: config.mirrorResync.intervalMs,
          enabled: config.mirrorResync.enabled,
          runImmediately: true,
          lock: advisoryLock(pool, MIRROR_RESYNC_LOCK_KEY),
        },
      )
    : null;

  server.listen(config.port, () => {
    log("INFO", "SERVER_STARTED", {
      port: config.port,
      mode: config.nodeEnv,
      mirror: mirror !== null,
      resources: RESOURCES.map((resource) => resource.name),
    });

    scheduler?.start();
  });

  ////////////////////////////////////////////////////////////////
  // Graceful shutdown
  ////////////////////////////////////////////////////////////////

  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    log("INFO", "SERVER_STOPPING", { signal });
    scheduler?.stop();

    await new Promise<void>((resolve) => server.close(() => resolve()));

    try {
      await pool.end();
      await mirrorConnection?.client.close();
    } catch (err) {
      log("ERROR", "SHUTDOWN_CLEANUP_FAILED", errorMeta(err));
    }

    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log("ERROR", err instanceof ConfigError ? "CONFIG_INVALID" : "SERVER_START_FAILED", errorMeta(err));
  process.exit(1);
});
