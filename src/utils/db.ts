// src/utils/db.ts
import { MongoClient, type Db } from "mongodb";

export interface DatabaseHandle {
  client: MongoClient;
  db: Db;
  close(): Promise<void>;
}

/** Open the Mongo connection once at startup; the caller owns closing it. */
export async function connectDatabase(uri: string, dbName: string): Promise<DatabaseHandle> {
  const client = new MongoClient(uri);
  await client.connect();
  const db = client.db(dbName);
  await db.command({ ping: 1 });
  console.log(`✅ Connected to MongoDB (${dbName})`);

  return {
    client,
    db,
    close: async () => {
      await client.close();
      console.log("MongoDB connection closed");
    },
  };
}
