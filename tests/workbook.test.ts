import { ZodError } from "zod";
import { decodeWorkbook, encodeWorkbook, toWorkbook } from "../src/modules/ledger/workbook";
import type { LedgerState } from "../src/modules/ledger/repository";

const state: LedgerState = {
  transactions: [
    { userId: 42, kind: "deposit", amountCents: 100000, timestamp: "2024-03-01 10:00:00" },
    { userId: 42, kind: "withdraw", amountCents: 30000, timestamp: "2024-03-01 10:01:00" }
  ],
  summaries: [
    {
      userId: 42,
      depositsCents: 100000,
      withdrawalsCents: 30000,
      balanceCents: 70000,
      roiBasisPoints: -7000,
      updatedAt: "2024-03-01 10:01:00"
    }
  ]
};

describe("ledger workbook", () => {
  test("lays out both tables with their header rows", () => {
    expect(toWorkbook(state)).toEqual({
      format: "ledger-workbook",
      version: 1,
      sheets: [
        {
          name: "Transactions",
          rows: [
            ["user_id", "type", "amount", "timestamp"],
            [42, "deposit", "1000.00", "2024-03-01 10:00:00"],
            [42, "withdraw", "300.00", "2024-03-01 10:01:00"]
          ]
        },
        {
          name: "Summary",
          rows: [
            ["user_id", "deposits", "withdrawals", "balance", "roi_percent", "updated_at"],
            [42, "1000.00", "300.00", "700.00", "-70.00", "2024-03-01 10:01:00"]
          ]
        }
      ]
    });
  });

  test("an empty ledger still carries both header rows", () => {
    const workbook = toWorkbook({ transactions: [], summaries: [] });
    expect(workbook.sheets.map((sheet) => sheet.rows)).toEqual([
      [["user_id", "type", "amount", "timestamp"]],
      [["user_id", "deposits", "withdrawals", "balance", "roi_percent", "updated_at"]]
    ]);
  });

  test("decodes what it encodes", () => {
    expect(decodeWorkbook(encodeWorkbook(state))).toEqual(state);
  });

  test("rejects a transaction row with a non-positive amount", () => {
    const workbook = toWorkbook(state);
    workbook.sheets[0].rows[1] = [42, "deposit", "0.00", "2024-03-01 10:00:00"];
    const bytes = Buffer.from(JSON.stringify(workbook));

    expect(() => decodeWorkbook(bytes)).toThrow(ZodError);
  });

  test("rejects an unknown transaction type and a malformed timestamp", () => {
    const badType = toWorkbook(state);
    badType.sheets[0].rows[1] = [42, "refund", "1.00", "2024-03-01 10:00:00"];
    expect(() => decodeWorkbook(Buffer.from(JSON.stringify(badType)))).toThrow(ZodError);

    const badTime = toWorkbook(state);
    badTime.sheets[0].rows[1] = [42, "deposit", "1.00", "2024-03-01T10:00:00Z"];
    expect(() => decodeWorkbook(Buffer.from(JSON.stringify(badTime)))).toThrow(ZodError);
  });

  test("rejects bytes that are not JSON", () => {
    expect(() => decodeWorkbook(Buffer.from("not json"))).toThrow(SyntaxError);
  });
});
