import { LedgerController } from "./modules/ledger/controller";
import { LedgerService } from "./modules/ledger/service";
import type { LedgerStore } from "./modules/ledger/repository";
import { MemoryLedgerStore } from "./infra/memory/memoryLedgerStore";
import { FileLedgerStore } from "./infra/file/fileLedgerStore";
import { PostgresLedgerStore } from "./infra/postgres/postgresLedgerStore";
import { getPool } from "./infra/postgres/pool";
import { Mutex } from "./common/mutex";
import type { LedgerLogger } from "./common/logger";
import { config } from "./config";

export type ContainerOptions = {
  now?: () => Date;
  store?: LedgerStore;
  logger?: LedgerLogger;
};

export function createLedgerStore(logger?: LedgerLogger): LedgerStore {
  switch (config.LEDGER_PROVIDER) {
    case "postgres":
      return new PostgresLedgerStore(getPool(logger));
    case "file":
      return new FileLedgerStore(config.LEDGER_FILE_PATH);
    case "memory":
      // Non-durable; for tests and local experiments.
      return new MemoryLedgerStore();
  }
}

export function createContainer(options: ContainerOptions = {}) {
  const store = options.store ?? createLedgerStore(options.logger);
  const ledgerService = new LedgerService(store, new Mutex(), options.now, options.logger);
  const ledgerController = new LedgerController(ledgerService);

  return {
    store,
    ledgerService,
    ledgerController
  };
}
