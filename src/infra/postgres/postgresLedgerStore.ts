import type { Pool, PoolClient } from "pg";
import { AppError, StorageError } from "../../common/errors";
import { formatBasisPoints, formatCents, parseCents } from "../../modules/ledger/amount";
import {
  isTransactionKind,
  LedgerStore,
  LedgerTransaction,
  LedgerWriteScope,
  UserSummary
} from "../../modules/ledger/repository";
import { encodeWorkbook } from "../../modules/ledger/workbook";

export const LEDGER_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ledger_transactions (
  seq BIGSERIAL PRIMARY KEY,
  user_id BIGINT NOT NULL,
  type TEXT NOT NULL CHECK (type IN ('deposit', 'withdraw')),
  amount NUMERIC(16, 2) NOT NULL CHECK (amount > 0),
  "timestamp" TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS ledger_transactions_user_seq_idx
  ON ledger_transactions (user_id, seq);

CREATE TABLE IF NOT EXISTS ledger_summary (
  user_id BIGINT PRIMARY KEY,
  deposits NUMERIC(18, 2) NOT NULL,
  withdrawals NUMERIC(18, 2) NOT NULL,
  balance NUMERIC(18, 2) NOT NULL,
  roi_percent NUMERIC(24, 2) NOT NULL,
  updated_at TEXT NOT NULL
);
`;

type TransactionRow = {
  user_id: string;
  type: string;
  amount: string;
  timestamp: string;
};

type SummaryRow = {
  user_id: string;
  deposits: string;
  withdrawals: string;
  balance: string;
  roi_percent: string;
  updated_at: string;
};

const TRANSACTION_COLUMNS = `user_id::text AS user_id, type, amount::text AS amount, "timestamp"`;
const SUMMARY_COLUMNS = `
  user_id::text AS user_id,
  deposits::text AS deposits,
  withdrawals::text AS withdrawals,
  balance::text AS balance,
  roi_percent::text AS roi_percent,
  updated_at`;

export class PostgresLedgerStore implements LedgerStore {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    await this.run(() => this.pool.query(LEDGER_SCHEMA_SQL));
  }

  async write<T>(work: (scope: LedgerWriteScope) => Promise<T>): Promise<T> {
    return this.withTransaction("BEGIN", async (client) => {
      // One writer at a time across processes; readers keep the last commit.
      await client.query("LOCK TABLE ledger_transactions, ledger_summary IN EXCLUSIVE MODE");
      return work(this.scopeFor(client));
    });
  }

  async readAll(): Promise<LedgerTransaction[]> {
    return this.withClient((client) => this.selectTransactions(client));
  }

  async listByUser(userId: number, limit: number): Promise<LedgerTransaction[]> {
    if (limit <= 0) {
      return [];
    }
    return this.run(async () => {
      const result = await this.pool.query<TransactionRow>(
        `
        SELECT ${TRANSACTION_COLUMNS}
        FROM ledger_transactions
        WHERE user_id = $1
        ORDER BY seq DESC
        LIMIT $2;
        `,
        [userId, limit]
      );
      return result.rows.map(mapTransactionRow);
    });
  }

  async getSummary(userId: number): Promise<UserSummary | null> {
    return this.run(async () => {
      const result = await this.pool.query<SummaryRow>(
        `SELECT ${SUMMARY_COLUMNS} FROM ledger_summary WHERE user_id = $1;`,
        [userId]
      );
      const row = result.rows[0];
      return row ? mapSummaryRow(row) : null;
    });
  }

  async listSummaries(): Promise<UserSummary[]> {
    return this.withClient((client) => this.selectSummaries(client));
  }

  async exportSnapshot(): Promise<Buffer> {
    return this.withTransaction(
      "BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY",
      async (client) => {
        const transactions = await this.selectTransactions(client);
        const summaries = await this.selectSummaries(client);
        return encodeWorkbook({ transactions, summaries });
      }
    );
  }

  async ping(): Promise<void> {
    await this.run(() => this.pool.query("SELECT 1"));
  }

  private scopeFor(client: PoolClient): LedgerWriteScope {
    return {
      append: async (transaction) => {
        const result = await client.query<TransactionRow>(
          `
          INSERT INTO ledger_transactions (user_id, type, amount, "timestamp")
          VALUES ($1, $2, $3, $4)
          RETURNING ${TRANSACTION_COLUMNS};
          `,
          [
            transaction.userId,
            transaction.kind,
            formatCents(transaction.amountCents),
            transaction.timestamp
          ]
        );
        return mapTransactionRow(result.rows[0]);
      },
      deleteUser: async (userId) => {
        const result = await client.query(
          "DELETE FROM ledger_transactions WHERE user_id = $1;",
          [userId]
        );
        return result.rowCount ?? 0;
      },
      readAll: () => this.selectTransactions(client),
      replaceSummaries: async (summaries) => {
        await client.query("DELETE FROM ledger_summary;");
        if (summaries.length === 0) {
          return;
        }
        await client.query(
          `
          INSERT INTO ledger_summary (user_id, deposits, withdrawals, balance, roi_percent, updated_at)
          SELECT * FROM unnest(
            $1::bigint[],
            $2::numeric[],
            $3::numeric[],
            $4::numeric[],
            $5::numeric[],
            $6::text[]
          );
          `,
          [
            summaries.map((row) => row.userId),
            summaries.map((row) => formatCents(row.depositsCents)),
            summaries.map((row) => formatCents(row.withdrawalsCents)),
            summaries.map((row) => formatCents(row.balanceCents)),
            summaries.map((row) => formatBasisPoints(row.roiBasisPoints)),
            summaries.map((row) => row.updatedAt)
          ]
        );
      }
    };
  }

  private async selectTransactions(client: PoolClient): Promise<LedgerTransaction[]> {
    const result = await client.query<TransactionRow>(
      `SELECT ${TRANSACTION_COLUMNS} FROM ledger_transactions ORDER BY seq ASC;`
    );
    return result.rows.map(mapTransactionRow);
  }

  private async selectSummaries(client: PoolClient): Promise<UserSummary[]> {
    const result = await client.query<SummaryRow>(
      `SELECT ${SUMMARY_COLUMNS} FROM ledger_summary ORDER BY user_id ASC;`
    );
    return result.rows.map(mapSummaryRow);
  }

  private async withTransaction<T>(
    begin: string,
    fn: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    const maxAttempts = 3;
    let attempt = 0;

    while (attempt < maxAttempts) {
      const client = await this.run(() => this.pool.connect());
      // Set when the connection itself is broken so the pool discards it.
      let brokenConnection: Error | undefined;
      try {
        await client.query(begin);
        const result = await fn(client);
        await client.query("COMMIT");
        return result;
      } catch (error) {
        try {
          await client.query("ROLLBACK");
        } catch (rollbackError) {
          brokenConnection =
            rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        }
        attempt += 1;
        const code = pgErrorCode(error);
        if (code && isRetryablePgError(code) && attempt < maxAttempts) {
          await delay(50 * attempt);
          continue;
        }
        throw toStorageError(error);
      } finally {
        client.release(brokenConnection);
      }
    }

    throw new StorageError("Transaction retry attempts exhausted");
  }

  private async withClient<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.run(() => this.pool.connect());
    try {
      return await this.run(() => fn(client));
    } finally {
      client.release();
    }
  }

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toStorageError(error);
    }
  }
}

function mapTransactionRow(row: TransactionRow): LedgerTransaction {
  const amountCents = parseCents(row.amount);
  if (!isTransactionKind(row.type) || amountCents === null) {
    throw new StorageError(`Malformed ledger_transactions row for user ${row.user_id}`);
  }
  return Object.freeze({
    userId: Number(row.user_id),
    kind: row.type,
    amountCents,
    timestamp: row.timestamp
  });
}

function mapSummaryRow(row: SummaryRow): UserSummary {
  const depositsCents = parseCents(row.deposits);
  const withdrawalsCents = parseCents(row.withdrawals);
  const balanceCents = parseCents(row.balance);
  const roiBasisPoints = parseCents(row.roi_percent);
  if (
    depositsCents === null ||
    withdrawalsCents === null ||
    balanceCents === null ||
    roiBasisPoints === null
  ) {
    throw new StorageError(`Malformed ledger_summary row for user ${row.user_id}`);
  }
  return {
    userId: Number(row.user_id),
    depositsCents,
    withdrawalsCents,
    balanceCents,
    roiBasisPoints,
    updatedAt: row.updated_at
  };
}

function pgErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function isRetryablePgError(code: string): boolean {
  return code === "40001" || code === "40P01" || code === "55P03" || code === "57P03";
}

function toStorageError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new StorageError("Ledger storage is unavailable", { cause: error });
}

async function delay(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
