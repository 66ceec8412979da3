// src/server.ts
import dotenv from "dotenv";
import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { connectDatabase, type DatabaseHandle } from "./utils/db";
import { InMemoryTradeReportStore, MongoTradeReportStore, type TradeReportStore } from "./services/reportStore";
import { InMemoryUserStore, MongoUserStore, type UserStore } from "./services/userStore";

dotenv.config();

async function main() {
  const config = loadConfig();

  let database: DatabaseHandle | null = null;
  let reports: TradeReportStore;
  let users: UserStore;

  if (config.storage === "mongo" && config.mongoUri && config.mongoDbName) {
    database = await connectDatabase(config.mongoUri, config.mongoDbName);
    const mongoReports = new MongoTradeReportStore(database.db);
    const mongoUsers = new MongoUserStore(database.db);
    await Promise.all([mongoReports.ensureIndexes(), mongoUsers.ensureIndexes()]);
    reports = mongoReports;
    users = mongoUsers;
  } else {
    console.warn("⚠️ STORAGE=memory: uploads and accounts are lost on restart");
    reports = new InMemoryTradeReportStore();
    users = new InMemoryUserStore();
  }

  const httpServer = createServer(createApp({ config, reports, users }));
  httpServer.listen(config.port, () => {
    console.log(`🚀 Server running at http://localhost:${config.port}`);
    console.log(`🔗 Allowed CORS origin: ${config.clientUrl}`);
    if (config.publicMode) console.log("🔓 PUBLIC_MODE on: authentication disabled");
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down gracefully...`);
    httpServer.close(() => {
      const closing = database ? database.close() : Promise.resolve();
      closing
        .then(() => {
          console.log("✅ Server closed");
          process.exit(0);
        })
        .catch((err: unknown) => {
          console.error("❌ Error while closing MongoDB:", err);
          process.exit(1);
        });
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("❌ Startup error:", err);
  process.exit(1);
});
