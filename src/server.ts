import { assertConfig, config } from "./config";
import { logger } from "./logger";
import { Orchestrator } from "./orchestrator/orchestrator";
import { FilePersistenceStore } from "./services/filePersistenceStore";
import { InMemoryPersistenceStore, PersistenceStore } from "./services/persistenceStore";
import { buildApp } from "./serverApp";

const store: PersistenceStore =
  config.persistence === "memory" ? new InMemoryPersistenceStore() : new FilePersistenceStore(config.dataDir);

const orchestrator = new Orchestrator({ store });

const app = buildApp({ orchestrator, store });

const start = async (): Promise<void> => {
  assertConfig();
  await app.listen({ port: config.port, host: config.host });
  logger.info({ persistence: config.persistence, dataDir: config.dataDir }, "devcrew orchestrator listening");
};

start().catch((error: unknown) => {
  app.log.error(error);
  process.exit(1);
});
