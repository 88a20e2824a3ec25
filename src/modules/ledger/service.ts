import { InvalidAmountError, InvalidUserError, StorageError } from "../../common/errors";
import type { LedgerLogger } from "../../common/logger";
import { Mutex } from "../../common/mutex";
import { formatTimestamp } from "../../common/time";
import { MAX_AMOUNT_CENTS } from "./amount";
import { recomputeSummaries } from "./projector";
import {
  isTransactionKind,
  LedgerStore,
  LedgerTransaction,
  LedgerWriteScope,
  TransactionKind,
  UserSummary
} from "./repository";

export const DEFAULT_HISTORY_LIMIT = 10;

export type UserStats = {
  depositsCents: number;
  withdrawalsCents: number;
  balanceCents: number;
  roiBasisPoints: number;
};

export type HistoryEntry = {
  kind: TransactionKind;
  amountCents: number;
  timestamp: string;
};

export type AddTransactionResult = {
  transaction: LedgerTransaction;
  stats: UserStats;
};

const ZERO_STATS: UserStats = {
  depositsCents: 0,
  withdrawalsCents: 0,
  balanceCents: 0,
  roiBasisPoints: 0
};

function toStats(summary: UserSummary | null | undefined): UserStats {
  if (!summary) {
    return { ...ZERO_STATS };
  }
  return {
    depositsCents: summary.depositsCents,
    withdrawalsCents: summary.withdrawalsCents,
    balanceCents: summary.balanceCents,
    roiBasisPoints: summary.roiBasisPoints
  };
}

export class LedgerService {
  constructor(
    private readonly store: LedgerStore,
    private readonly writeLock: Mutex = new Mutex(),
    private readonly now: () => Date = () => new Date(),
    private readonly logger?: LedgerLogger
  ) {}

  async addTransaction(
    userId: number,
    kind: TransactionKind,
    amountCents: number
  ): Promise<AddTransactionResult> {
    this.validateUserId(userId);
    if (!isTransactionKind(kind)) {
      throw new InvalidAmountError(`Unknown transaction kind: ${String(kind)}`);
    }
    if (!Number.isSafeInteger(amountCents) || amountCents <= 0) {
      throw new InvalidAmountError();
    }
    if (amountCents > MAX_AMOUNT_CENTS) {
      throw new InvalidAmountError("Amount exceeds allowed limits");
    }

    const { result, summaries } = await this.commit(
      "addTransaction",
      { userId, kind, amountCents },
      (scope, timestamp) => scope.append({ userId, kind, amountCents, timestamp })
    );

    this.logger?.info({ userId, kind, amountCents }, "Transaction recorded");
    return {
      transaction: result,
      stats: toStats(summaries.find((row) => row.userId === userId))
    };
  }

  async deposit(userId: number, amountCents: number): Promise<AddTransactionResult> {
    return this.addTransaction(userId, "deposit", amountCents);
  }

  async withdraw(userId: number, amountCents: number): Promise<AddTransactionResult> {
    return this.addTransaction(userId, "withdraw", amountCents);
  }

  async resetUser(userId: number): Promise<{ removed: number }> {
    this.validateUserId(userId);
    const { result: removed } = await this.commit("resetUser", { userId }, (scope) =>
      scope.deleteUser(userId)
    );
    this.logger?.info({ userId, removed }, "User transactions deleted");
    return { removed };
  }

  async getUserStats(userId: number): Promise<UserStats> {
    this.validateUserId(userId);
    return toStats(await this.store.getSummary(userId));
  }

  async getUserHistory(
    userId: number,
    limit: number = DEFAULT_HISTORY_LIMIT
  ): Promise<HistoryEntry[]> {
    this.validateUserId(userId);
    if (!Number.isInteger(limit) || limit <= 0) {
      return [];
    }
    const transactions = await this.store.listByUser(userId, limit);
    return transactions.map((tx) => ({
      kind: tx.kind,
      amountCents: tx.amountCents,
      timestamp: tx.timestamp
    }));
  }

  async listSummaries(): Promise<UserSummary[]> {
    return this.store.listSummaries();
  }

  async exportSnapshot(): Promise<Buffer> {
    return this.store.exportSnapshot();
  }

  async checkStorage(): Promise<void> {
    await this.store.ping();
  }

  /**
   * Mutates the log, rebuilds the whole projection from the resulting log and
   * commits both as one unit. Writers are serialized by `writeLock`.
   */
  private async commit<T>(
    action: string,
    context: Record<string, unknown>,
    mutate: (scope: LedgerWriteScope, timestamp: string) => Promise<T>
  ): Promise<{ result: T; summaries: UserSummary[] }> {
    try {
      return await this.writeLock.runExclusive(() =>
        this.store.write(async (scope) => {
          const timestamp = formatTimestamp(this.now());
          const result = await mutate(scope, timestamp);
          const summaries = recomputeSummaries(await scope.readAll(), timestamp);
          this.assertTotalsInRange(summaries);
          await scope.replaceSummaries(summaries);
          return { result, summaries };
        })
      );
    } catch (error) {
      if (error instanceof StorageError) {
        this.logger?.error({ err: error, action, ...context }, "Ledger write failed");
      }
      throw error;
    }
  }

  private assertTotalsInRange(summaries: readonly UserSummary[]) {
    const overflow = summaries.find(
      (row) =>
        !Number.isSafeInteger(row.depositsCents) ||
        !Number.isSafeInteger(row.withdrawalsCents) ||
        !Number.isSafeInteger(row.roiBasisPoints)
    );
    if (overflow) {
      throw new InvalidAmountError(`Totals for user ${overflow.userId} would exceed allowed limits`);
    }
  }

  private validateUserId(userId: number) {
    if (!Number.isSafeInteger(userId)) {
      throw new InvalidUserError();
    }
  }
}
