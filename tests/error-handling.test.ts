import { buildApp } from "../src/app";
import { FastifyInstance } from "fastify";
import { StorageError } from "../src/common/errors";
import { MemoryLedgerStore } from "../src/infra/memory/memoryLedgerStore";
import type { LedgerState } from "../src/modules/ledger/repository";

class UnreliableStore extends MemoryLedgerStore {
  broken = false;

  protected async persist(next: LedgerState): Promise<void> {
    if (this.broken) {
      throw new StorageError("Failed to write ledger file test-ledger.json");
    }
    await super.persist(next);
  }

  async ping(): Promise<void> {
    if (this.broken) {
      throw new StorageError();
    }
    await super.ping();
  }
}

describe("storage failures", () => {
  let app: FastifyInstance;
  let store: UnreliableStore;
  const now = () => new Date("2024-01-01T00:00:00Z");

  beforeAll(async () => {
    store = new UnreliableStore();
    app = buildApp({ now, store });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => {
    store.broken = false;
  });

  test("a failed write returns 503 and leaves the ledger unchanged", async () => {
    const ok = await app.inject({
      method: "POST",
      url: "/users/3/deposits",
      payload: { amount: "50" }
    });
    expect(ok.statusCode).toBe(201);

    store.broken = true;
    const failed = await app.inject({
      method: "POST",
      url: "/users/3/withdrawals",
      payload: { amount: "20" }
    });
    expect(failed.statusCode).toBe(503);
    expect(failed.json()).toEqual({
      error: "STORAGE_IO_ERROR",
      message: "Failed to write ledger file test-ledger.json"
    });

    store.broken = false;
    const stats = await app.inject({ method: "GET", url: "/users/3/stats" });
    expect(stats.json().withdrawals).toBe("0.00");
    expect(stats.json().balance).toBe("50.00");
  });

  test("a failed reset keeps the user's transactions", async () => {
    await app.inject({ method: "POST", url: "/users/4/deposits", payload: { amount: "5" } });

    store.broken = true;
    const failed = await app.inject({ method: "DELETE", url: "/users/4/transactions" });
    expect(failed.statusCode).toBe(503);

    store.broken = false;
    const history = await app.inject({ method: "GET", url: "/users/4/history" });
    expect(history.json().entries).toHaveLength(1);
  });

  test("store health reports down while storage is failing", async () => {
    store.broken = true;
    const res = await app.inject({ method: "GET", url: "/health/store" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "down" });
  });

  test("malformed JSON bodies are rejected as invalid requests", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/users/3/deposits",
      headers: { "content-type": "application/json" },
      payload: "{\"amount\":"
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("INVALID_REQUEST");
  });
});
