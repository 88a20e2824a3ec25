import type { LedgerTransaction, UserSummary } from "./repository";

type RunningTotals = { depositsCents: number; withdrawalsCents: number };

/**
 * Rebuilds every user's summary from the full log. Rows come out sorted by
 * user id and all carry the same `updatedAt`.
 */
export function recomputeSummaries(
  log: readonly LedgerTransaction[],
  updatedAt: string
): UserSummary[] {
  const totals = new Map<number, RunningTotals>();

  for (const tx of log) {
    let entry = totals.get(tx.userId);
    if (!entry) {
      entry = { depositsCents: 0, withdrawalsCents: 0 };
      totals.set(tx.userId, entry);
    }
    if (tx.kind === "deposit") {
      entry.depositsCents += tx.amountCents;
    } else {
      entry.withdrawalsCents += tx.amountCents;
    }
  }

  return [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([userId, entry]) => ({
      userId,
      depositsCents: entry.depositsCents,
      withdrawalsCents: entry.withdrawalsCents,
      balanceCents: entry.depositsCents - entry.withdrawalsCents,
      roiBasisPoints: roiBasisPoints(entry.depositsCents, entry.withdrawalsCents),
      updatedAt
    }));
}

/**
 * `(withdrawals - deposits) / deposits * 100` percent, in hundredths of a
 * percent and rounded half-even. Zero when nothing was deposited. Exact while
 * the result is a safe integer; callers must reject anything beyond that.
 */
export function roiBasisPoints(depositsCents: number, withdrawalsCents: number): number {
  if (depositsCents <= 0) {
    return 0;
  }
  const numerator = (BigInt(withdrawalsCents) - BigInt(depositsCents)) * 10_000n;
  return Number(divideHalfEven(numerator, BigInt(depositsCents)));
}

function divideHalfEven(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n;
  const magnitude = negative ? -numerator : numerator;
  let quotient = magnitude / denominator;
  const twiceRemainder = (magnitude % denominator) * 2n;
  if (twiceRemainder > denominator || (twiceRemainder === denominator && quotient % 2n === 1n)) {
    quotient += 1n;
  }
  return negative ? -quotient : quotient;
}
