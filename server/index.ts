import { createServer } from "http";
import { createApp } from "./app";
import { createDatabase, type DatabaseHandle } from "./db";
import { createDatabaseIndexes } from "./db-indexes";
import { DatabaseStorage, type IStorage } from "./storage";
import { MemStorage } from "./mem-storage";
import { loadConfig, logEnvironmentInfo } from "./lib/environment";
import { log, errorMessage } from "./lib/log";
import { ScanOrchestrator } from "./services/orchestrator";
import { HttpAgentClient } from "./services/agents/agent-client";

(async () => {
  const config = loadConfig();
  logEnvironmentInfo(config);

  let database: DatabaseHandle | null = null;
  let storage: IStorage;
  if (config.storageDriver === "postgres") {
    database = createDatabase(config.databaseUrl);
    storage = new DatabaseStorage(database.db);
    try {
      await createDatabaseIndexes(database.db);
    } catch (error) {
      console.warn("Database indexing skipped:", errorMessage(error));
    }
  } else {
    storage = new MemStorage();
  }

  const orchestrator = new ScanOrchestrator({
    config,
    storage,
    agentClient: new HttpAgentClient(),
  });
  await orchestrator.init();

  const app = createApp(orchestrator);
  const httpServer = createServer(app);

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
    orchestrator.start();
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`${signal} received, shutting down`);

    httpServer.close();
    await orchestrator.shutdown();
    if (database) {
      await database.close();
    }
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        console.error("Shutdown failed:", errorMessage(error));
        process.exit(1);
      });
    });
  }
})().catch((error) => {
  console.error("Fatal start-up error:", errorMessage(error));
  process.exit(1);
});
