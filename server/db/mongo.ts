import { MongoClient, type Db } from "mongodb";

import { env } from "../config/env";

let client: MongoClient | null = null;
let db: Db | null = null;
let testDbOverride: Db | null = null;

export function __setTestMongoDb(dbOverride: Db | null): void {
  testDbOverride = dbOverride;
  if (dbOverride) {
    db = dbOverride;
    client = null;
  } else {
    db = null;
  }
}

export async function getMongo(): Promise<Db> {
  if (testDbOverride) return testDbOverride;
  if (db) return db;
  const connected = await MongoClient.connect(env.MONGO_URI, {});
  client = connected;
  db = connected.db(env.MONGO_DB);
  return db;
}

export async function closeMongo(): Promise<void> {
  const current = client;
  client = null;
  db = null;
  if (current) {
    await current.close();
  }
}
