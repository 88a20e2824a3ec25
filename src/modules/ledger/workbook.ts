import { z } from "zod";
import { isTimestamp } from "../../common/time";
import { formatBasisPoints, formatCents, parseCents } from "./amount";
import {
  LedgerState,
  LedgerTransaction,
  TRANSACTION_KINDS,
  UserSummary
} from "./repository";

export const WORKBOOK_FORMAT = "ledger-workbook";
export const WORKBOOK_VERSION = 1;
export const TRANSACTIONS_SHEET = "Transactions";
export const SUMMARY_SHEET = "Summary";
export const TRANSACTION_HEADERS = ["user_id", "type", "amount", "timestamp"] as const;
export const SUMMARY_HEADERS = [
  "user_id",
  "deposits",
  "withdrawals",
  "balance",
  "roi_percent",
  "updated_at"
] as const;

type Cell = string | number;

export type WorkbookSheet = {
  name: string;
  rows: Cell[][];
};

export type LedgerWorkbook = {
  format: typeof WORKBOOK_FORMAT;
  version: typeof WORKBOOK_VERSION;
  sheets: [WorkbookSheet, WorkbookSheet];
};

const userIdCell = z.number().int().refine(Number.isSafeInteger, "user_id must be a safe integer");

const decimalCell = z.string().transform((value, ctx) => {
  const cents = parseCents(value);
  if (cents === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a two-decimal amount, got "${value}"` });
    return z.NEVER;
  }
  return cents;
});

const timestampCell = z.string().refine(isTimestamp, "Expected YYYY-MM-DD HH:MM:SS");

const transactionRow = z.tuple([
  userIdCell,
  z.enum(TRANSACTION_KINDS),
  decimalCell.refine((cents) => cents > 0, "amount must be positive"),
  timestampCell
]);

const summaryRow = z.tuple([
  userIdCell,
  decimalCell,
  decimalCell,
  decimalCell,
  decimalCell,
  timestampCell
]);

const workbookSchema = z.object({
  format: z.literal(WORKBOOK_FORMAT),
  version: z.literal(WORKBOOK_VERSION),
  sheets: z.tuple([
    z.object({
      name: z.literal(TRANSACTIONS_SHEET),
      rows: z
        .tuple([
          z.tuple([
            z.literal("user_id"),
            z.literal("type"),
            z.literal("amount"),
            z.literal("timestamp")
          ])
        ])
        .rest(transactionRow)
    }),
    z.object({
      name: z.literal(SUMMARY_SHEET),
      rows: z
        .tuple([
          z.tuple([
            z.literal("user_id"),
            z.literal("deposits"),
            z.literal("withdrawals"),
            z.literal("balance"),
            z.literal("roi_percent"),
            z.literal("updated_at")
          ])
        ])
        .rest(summaryRow)
    })
  ])
});

export function toWorkbook(state: LedgerState): LedgerWorkbook {
  return {
    format: WORKBOOK_FORMAT,
    version: WORKBOOK_VERSION,
    sheets: [
      {
        name: TRANSACTIONS_SHEET,
        rows: [
          [...TRANSACTION_HEADERS],
          ...state.transactions.map((tx) => [
            tx.userId,
            tx.kind,
            formatCents(tx.amountCents),
            tx.timestamp
          ])
        ]
      },
      {
        name: SUMMARY_SHEET,
        rows: [
          [...SUMMARY_HEADERS],
          ...state.summaries.map((summary) => [
            summary.userId,
            formatCents(summary.depositsCents),
            formatCents(summary.withdrawalsCents),
            formatCents(summary.balanceCents),
            formatBasisPoints(summary.roiBasisPoints),
            summary.updatedAt
          ])
        ]
      }
    ]
  };
}

export function encodeWorkbook(state: LedgerState): Buffer {
  return Buffer.from(`${JSON.stringify(toWorkbook(state), null, 2)}\n`, "utf8");
}

/** Throws a `ZodError` or `SyntaxError` when the bytes are not a ledger workbook. */
export function decodeWorkbook(bytes: Buffer): LedgerState {
  const workbook = workbookSchema.parse(JSON.parse(bytes.toString("utf8")));
  const [transactionsSheet, summarySheet] = workbook.sheets;
  const [, ...transactionRows] = transactionsSheet.rows;
  const [, ...summaryRows] = summarySheet.rows;

  const transactions: LedgerTransaction[] = transactionRows.map(
    ([userId, kind, amountCents, timestamp]) => Object.freeze({ userId, kind, amountCents, timestamp })
  );
  const summaries: UserSummary[] = summaryRows.map(
    ([userId, depositsCents, withdrawalsCents, balanceCents, roiBasisPoints, updatedAt]) => ({
      userId,
      depositsCents,
      withdrawalsCents,
      balanceCents,
      roiBasisPoints,
      updatedAt
    })
  );

  return { transactions, summaries };
}
