import { buildApp } from "../src/app";
import { FastifyInstance } from "fastify";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";

let app: FastifyInstance;
let nowValue = new Date("2024-01-01T00:00:00Z");
const now = () => nowValue;

async function deposit(userId: number, amount: string | number) {
  return app.inject({
    method: "POST",
    url: `/users/${userId}/deposits`,
    payload: { amount }
  });
}

async function withdraw(userId: number, amount: string | number) {
  return app.inject({
    method: "POST",
    url: `/users/${userId}/withdrawals`,
    payload: { amount }
  });
}

beforeAll(async () => {
  app = buildApp({ now, store: new MemoryLedgerStore() });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

test("deposit, withdraw, stats and history for user 42", async () => {
  nowValue = new Date("2024-01-01T09:00:00Z");
  const depositRes = await deposit(42, "1000");
  expect(depositRes.statusCode).toBe(201);
  expect(depositRes.json()).toEqual({
    transaction: {
      userId: 42,
      type: "deposit",
      amount: "1000.00",
      timestamp: "2024-01-01 09:00:00"
    },
    balance: "1000.00",
    roiPercent: "0.00"
  });

  nowValue = new Date("2024-01-01T09:05:00Z");
  const withdrawRes = await withdraw(42, "300,00");
  expect(withdrawRes.statusCode).toBe(201);
  expect(withdrawRes.json().balance).toBe("700.00");

  const statsRes = await app.inject({ method: "GET", url: "/users/42/stats" });
  expect(statsRes.statusCode).toBe(200);
  expect(statsRes.json()).toEqual({
    userId: 42,
    deposits: "1000.00",
    withdrawals: "300.00",
    balance: "700.00",
    roiPercent: "-70.00",
    pnl: "-700.00",
    outcome: "loss"
  });

  const balanceRes = await app.inject({ method: "GET", url: "/users/42/balance" });
  expect(balanceRes.json()).toEqual({ userId: 42, balance: "700.00", roiPercent: "-70.00" });

  const historyRes = await app.inject({ method: "GET", url: "/users/42/history" });
  expect(historyRes.statusCode).toBe(200);
  expect(historyRes.json()).toEqual({
    userId: 42,
    entries: [
      { type: "withdraw", amount: "300.00", timestamp: "2024-01-01 09:05:00" },
      { type: "deposit", amount: "1000.00", timestamp: "2024-01-01 09:00:00" }
    ]
  });
});

test("brand-new user has zero stats and empty history", async () => {
  const statsRes = await app.inject({ method: "GET", url: "/users/99/stats" });
  expect(statsRes.statusCode).toBe(200);
  expect(statsRes.json()).toEqual({
    userId: 99,
    deposits: "0.00",
    withdrawals: "0.00",
    balance: "0.00",
    roiPercent: "0.00",
    pnl: "0.00",
    outcome: "profit"
  });

  const historyRes = await app.inject({ method: "GET", url: "/users/99/history" });
  expect(historyRes.json()).toEqual({ userId: 99, entries: [] });
});

test("history honours the limit query", async () => {
  for (const amount of ["1", "2", "3", "4"]) {
    await deposit(7, amount);
  }

  const res = await app.inject({ method: "GET", url: "/users/7/history?limit=2" });
  expect(res.json().entries.map((entry: { amount: string }) => entry.amount)).toEqual([
    "4.00",
    "3.00"
  ]);

  const invalid = await app.inject({ method: "GET", url: "/users/7/history?limit=0" });
  expect(invalid.statusCode).toBe(400);
  expect(invalid.json().error).toBe("INVALID_REQUEST");
});

test("reset deletes the user's transactions and is idempotent", async () => {
  await deposit(55, "10");
  await withdraw(55, "2.5");

  const first = await app.inject({ method: "DELETE", url: "/users/55/transactions" });
  expect(first.statusCode).toBe(200);
  expect(first.json()).toEqual({ userId: 55, removed: 2 });

  const second = await app.inject({ method: "DELETE", url: "/users/55/transactions" });
  expect(second.json()).toEqual({ userId: 55, removed: 0 });

  const statsRes = await app.inject({ method: "GET", url: "/users/55/stats" });
  expect(statsRes.json().balance).toBe("0.00");
});

test("rejects invalid amounts", async () => {
  for (const amount of ["-5", "abc", "0", "0.001"]) {
    const res = await deposit(1, amount);
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("INVALID_AMOUNT");
  }

  const missing = await app.inject({
    method: "POST",
    url: "/users/1/deposits",
    payload: {}
  });
  expect(missing.statusCode).toBe(400);
  expect(missing.json().error).toBe("INVALID_AMOUNT");

  const statsRes = await app.inject({ method: "GET", url: "/users/1/stats" });
  expect(statsRes.json().deposits).toBe("0.00");
});

test("accepts numeric amounts in the body", async () => {
  const res = await deposit(12, 19.99);
  expect(res.statusCode).toBe(201);
  expect(res.json().transaction.amount).toBe("19.99");
});

test("rejects a non-integer user id", async () => {
  const res = await app.inject({ method: "GET", url: "/users/abc/stats" });
  expect(res.statusCode).toBe(400);
  expect(res.json().error).toBe("INVALID_REQUEST");
});

test("export returns the workbook as an attachment", async () => {
  const res = await app.inject({ method: "GET", url: "/export" });
  expect(res.statusCode).toBe(200);
  expect(res.headers["content-disposition"]).toBe('attachment; filename="ledger.json"');

  const workbook = res.json();
  expect(workbook.format).toBe("ledger-workbook");
  expect(workbook.sheets.map((sheet: { name: string }) => sheet.name)).toEqual([
    "Transactions",
    "Summary"
  ]);
  expect(workbook.sheets[1].rows[0]).toEqual([
    "user_id",
    "deposits",
    "withdrawals",
    "balance",
    "roi_percent",
    "updated_at"
  ]);
  const summaryUserIds = workbook.sheets[1].rows
    .slice(1)
    .map((row: Array<string | number>) => row[0]);
  expect(summaryUserIds).toEqual([...summaryUserIds].sort((a: number, b: number) => a - b));
  expect(summaryUserIds).toContain(42);
  expect(summaryUserIds).not.toContain(55);
});

test("health endpoints", async () => {
  const health = await app.inject({ method: "GET", url: "/health" });
  expect(health.json()).toEqual({ status: "ok" });

  const store = await app.inject({ method: "GET", url: "/health/store" });
  expect(store.json().status).toBe("ok");
});

test("unknown routes return NOT_FOUND", async () => {
  const res = await app.inject({ method: "GET", url: "/nope" });
  expect(res.statusCode).toBe(404);
  expect(res.json().error).toBe("NOT_FOUND");
});
