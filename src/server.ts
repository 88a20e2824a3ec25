import "dotenv/config";
import { buildApp } from "./app";
import { config } from "./config";
import { getPool } from "./infra/postgres/pool";
import { PostgresLedgerStore } from "./infra/postgres/postgresLedgerStore";

async function start() {
  const app = buildApp();

  if (config.LEDGER_PROVIDER === "postgres") {
    try {
      await new PostgresLedgerStore(getPool(app.log)).ensureSchema();
      app.log.info("Ledger tables ready");
    } catch (error) {
      app.log.error({ err: error }, "Database connection failed");
      process.exit(1);
    }
  }

  if (config.LEDGER_PROVIDER === "memory") {
    app.log.warn("Running with in-memory ledger (non-durable)");
  } else if (config.LEDGER_PROVIDER === "file") {
    app.log.info({ path: config.LEDGER_FILE_PATH }, "Using file ledger");
  }

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, "Shutdown failed");
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ port: config.PORT, host: config.HOST });
}

start().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
