import { formatBasisPoints, formatCents, parseAmount } from "./amount";
import type { TransactionKind } from "./repository";
import { AddTransactionResult, LedgerService, UserStats } from "./service";

export const EXPORT_FILENAME = "ledger.json";

function statsView(userId: number, stats: UserStats) {
  const pnlCents = stats.withdrawalsCents - stats.depositsCents;
  return {
    userId,
    deposits: formatCents(stats.depositsCents),
    withdrawals: formatCents(stats.withdrawalsCents),
    balance: formatCents(stats.balanceCents),
    roiPercent: formatBasisPoints(stats.roiBasisPoints),
    pnl: formatCents(pnlCents),
    outcome: pnlCents >= 0 ? ("profit" as const) : ("loss" as const)
  };
}

function transactionView({ transaction, stats }: AddTransactionResult) {
  return {
    transaction: {
      userId: transaction.userId,
      type: transaction.kind,
      amount: formatCents(transaction.amountCents),
      timestamp: transaction.timestamp
    },
    balance: formatCents(stats.balanceCents),
    roiPercent: formatBasisPoints(stats.roiBasisPoints)
  };
}

export class LedgerController {
  constructor(private readonly service: LedgerService) {}

  async addTransaction(userId: number, kind: TransactionKind, rawAmount: string) {
    const amountCents = parseAmount(rawAmount);
    return transactionView(await this.service.addTransaction(userId, kind, amountCents));
  }

  async getBalance(userId: number) {
    const stats = await this.service.getUserStats(userId);
    return {
      userId,
      balance: formatCents(stats.balanceCents),
      roiPercent: formatBasisPoints(stats.roiBasisPoints)
    };
  }

  async getStats(userId: number) {
    return statsView(userId, await this.service.getUserStats(userId));
  }

  async getHistory(userId: number, limit: number) {
    const entries = await this.service.getUserHistory(userId, limit);
    return {
      userId,
      entries: entries.map((entry) => ({
        type: entry.kind,
        amount: formatCents(entry.amountCents),
        timestamp: entry.timestamp
      }))
    };
  }

  async resetUser(userId: number) {
    const { removed } = await this.service.resetUser(userId);
    return { userId, removed };
  }

  exportSnapshot() {
    return this.service.exportSnapshot();
  }

  checkStorage() {
    return this.service.checkStorage();
  }
}
