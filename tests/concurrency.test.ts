import { buildApp } from "../src/app";
import { FastifyInstance } from "fastify";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";

let app: FastifyInstance;
let store: MemoryLedgerStore;
const now = () => new Date("2024-01-01T00:00:00Z");

beforeAll(async () => {
  store = new MemoryLedgerStore();
  app = buildApp({ now, store });
  await app.ready();
});

afterAll(async () => {
  await app.close();
});

test("concurrent deposits and withdrawals are all recorded", async () => {
  const requests = Array.from({ length: 40 }, (_, i) =>
    app.inject({
      method: "POST",
      url: `/users/500/${i % 4 === 0 ? "withdrawals" : "deposits"}`,
      payload: { amount: "1.25" }
    })
  );

  const results = await Promise.all(requests);
  expect(results.every((res) => res.statusCode === 201)).toBe(true);

  const stats = await app.inject({ method: "GET", url: "/users/500/stats" });
  expect(stats.json()).toEqual({
    userId: 500,
    deposits: "37.50",
    withdrawals: "12.50",
    balance: "25.00",
    roiPercent: "-66.67",
    pnl: "-25.00",
    outcome: "loss"
  });
  expect(await store.readAll()).toHaveLength(40);
});

test("a reset racing with deposits leaves log and summary consistent", async () => {
  await Promise.all([
    app.inject({ method: "POST", url: "/users/600/deposits", payload: { amount: "10" } }),
    app.inject({ method: "DELETE", url: "/users/600/transactions" }),
    app.inject({ method: "POST", url: "/users/600/deposits", payload: { amount: "10" } })
  ]);

  const log = (await store.readAll()).filter((tx) => tx.userId === 600);
  const summary = (await store.listSummaries()).find((row) => row.userId === 600);
  const deposited = log.reduce((sum, tx) => sum + tx.amountCents, 0);

  if (log.length === 0) {
    expect(summary).toBeUndefined();
  } else {
    expect(summary?.depositsCents).toBe(deposited);
  }
});
