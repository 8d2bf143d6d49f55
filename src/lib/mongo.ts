// src/lib/mongo.ts
// MongoDB connection for the read mirror. Optional: absent configuration disables mirroring.

import { MongoClient, type Db } from "mongodb";
import { log } from "@/lib/observability/logger";

export type MirrorConnection = {
  client: MongoClient;
  db: Db;
};

export async function connectMirror(
  url: string,
  database: string,
): Promise<MirrorConnection> {
  const client = new MongoClient(url);
  await client.connect();

  log("INFO", "MIRROR_CONNECTED", { database });

  return { client, db: client.db(database) };
}
