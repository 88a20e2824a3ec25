import {
  emptyLedgerState,
  LedgerState,
  LedgerStore,
  LedgerTransaction,
  LedgerWriteScope,
  UserSummary
} from "../../modules/ledger/repository";
import { encodeWorkbook } from "../../modules/ledger/workbook";

type Draft = {
  transactions: LedgerTransaction[];
  summaries: UserSummary[];
};

/**
 * Keeps the committed ledger as one immutable snapshot. Writes build a draft
 * copy and swap it in only after {@link persist} succeeds, so a failed write
 * is never observable. Subclasses plug durability in through `load` and
 * `persist`.
 */
export class MemoryLedgerStore implements LedgerStore {
  private state: LedgerState | null = null;
  private loading: Promise<LedgerState> | null = null;

  constructor(private readonly initialState: LedgerState = emptyLedgerState()) {}

  protected async load(): Promise<LedgerState> {
    return this.initialState;
  }

  // Nothing to persist in memory.
  protected async persist(_next: LedgerState): Promise<void> {}

  protected async current(): Promise<LedgerState> {
    if (this.state) {
      return this.state;
    }
    if (!this.loading) {
      this.loading = this.load();
    }
    try {
      const loaded = await this.loading;
      this.state ??= loaded;
      return this.state;
    } catch (error) {
      this.loading = null;
      throw error;
    }
  }

  async write<T>(work: (scope: LedgerWriteScope) => Promise<T>): Promise<T> {
    const committed = await this.current();
    const draft: Draft = {
      transactions: [...committed.transactions],
      summaries: [...committed.summaries]
    };

    const result = await work(this.scopeFor(draft));
    const next: LedgerState = {
      transactions: draft.transactions,
      summaries: draft.summaries
    };
    await this.persist(next);
    this.state = next;
    return result;
  }

  async readAll(): Promise<LedgerTransaction[]> {
    const state = await this.current();
    return [...state.transactions];
  }

  async listByUser(userId: number, limit: number): Promise<LedgerTransaction[]> {
    if (limit <= 0) {
      return [];
    }
    const state = await this.current();
    return state.transactions
      .filter((tx) => tx.userId === userId)
      .slice(-limit)
      .reverse();
  }

  async getSummary(userId: number): Promise<UserSummary | null> {
    const state = await this.current();
    const summary = state.summaries.find((row) => row.userId === userId);
    return summary ? { ...summary } : null;
  }

  async listSummaries(): Promise<UserSummary[]> {
    const state = await this.current();
    return state.summaries.map((row) => ({ ...row }));
  }

  async exportSnapshot(): Promise<Buffer> {
    return encodeWorkbook(await this.current());
  }

  async ping(): Promise<void> {
    await this.current();
  }

  private scopeFor(draft: Draft): LedgerWriteScope {
    return {
      append: async (transaction) => {
        const appended = Object.freeze({ ...transaction });
        draft.transactions.push(appended);
        return appended;
      },
      deleteUser: async (userId) => {
        const before = draft.transactions.length;
        draft.transactions = draft.transactions.filter((tx) => tx.userId !== userId);
        return before - draft.transactions.length;
      },
      readAll: async () => [...draft.transactions],
      replaceSummaries: async (summaries) => {
        draft.summaries = summaries.map((row) => ({ ...row }));
      }
    };
  }
}
