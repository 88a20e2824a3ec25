import type { FastifyBaseLogger } from "fastify";

/** The slice of the Fastify (pino) logger the ledger writes to. */
export type LedgerLogger = Pick<FastifyBaseLogger, "info" | "warn" | "error">;
