export const TRANSACTION_KINDS = ["deposit", "withdraw"] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

export function isTransactionKind(value: string): value is TransactionKind {
  return (TRANSACTION_KINDS as readonly string[]).includes(value);
}

export type LedgerTransaction = {
  readonly userId: number;
  readonly kind: TransactionKind;
  readonly amountCents: number;
  readonly timestamp: string;
};

export type UserSummary = {
  userId: number;
  depositsCents: number;
  withdrawalsCents: number;
  balanceCents: number;
  roiBasisPoints: number;
  updatedAt: string;
};

export type LedgerState = {
  transactions: readonly LedgerTransaction[];
  summaries: readonly UserSummary[];
};

export function emptyLedgerState(): LedgerState {
  return { transactions: [], summaries: [] };
}

// Append-only log of monetary events, in insertion order.
export interface TransactionLog {
  append(transaction: LedgerTransaction): Promise<LedgerTransaction>;
  deleteUser(userId: number): Promise<number>;
  readAll(): Promise<LedgerTransaction[]>;
}

export interface LedgerWriteScope extends TransactionLog {
  replaceSummaries(summaries: readonly UserSummary[]): Promise<void>;
}

export interface LedgerStore {
  /**
   * Runs `work` against a private draft of the ledger and commits the log and
   * summary together once it resolves. If `work` or the commit fails, readers
   * keep seeing the previously committed state.
   */
  write<T>(work: (scope: LedgerWriteScope) => Promise<T>): Promise<T>;
  readAll(): Promise<LedgerTransaction[]>;
  // Most recent first.
  listByUser(userId: number, limit: number): Promise<LedgerTransaction[]>;
  getSummary(userId: number): Promise<UserSummary | null>;
  listSummaries(): Promise<UserSummary[]>;
  exportSnapshot(): Promise<Buffer>;
  ping(): Promise<void>;
}
