import { FastifyInstance } from "fastify";
import { EXPORT_FILENAME, LedgerController } from "./controller";
import { amountBodySchema, historyQuerySchema, userParamsSchema } from "./schemas";

export function registerLedgerRoutes(app: FastifyInstance, controller: LedgerController) {
  app.post("/users/:userId/deposits", async (request, reply) => {
    const params = userParamsSchema.parse(request.params);
    const body = amountBodySchema.parse(request.body);
    const result = await controller.addTransaction(params.userId, "deposit", body.amount);
    return reply.status(201).send(result);
  });

  app.post("/users/:userId/withdrawals", async (request, reply) => {
    const params = userParamsSchema.parse(request.params);
    const body = amountBodySchema.parse(request.body);
    const result = await controller.addTransaction(params.userId, "withdraw", body.amount);
    return reply.status(201).send(result);
  });

  app.get("/users/:userId/balance", async (request) => {
    const params = userParamsSchema.parse(request.params);
    return controller.getBalance(params.userId);
  });

  app.get("/users/:userId/stats", async (request) => {
    const params = userParamsSchema.parse(request.params);
    return controller.getStats(params.userId);
  });

  app.get("/users/:userId/history", async (request) => {
    const params = userParamsSchema.parse(request.params);
    const query = historyQuerySchema.parse(request.query);
    return controller.getHistory(params.userId, query.limit);
  });

  app.delete("/users/:userId/transactions", async (request) => {
    const params = userParamsSchema.parse(request.params);
    return controller.resetUser(params.userId);
  });

  app.get("/export", async (_request, reply) => {
    const bytes = await controller.exportSnapshot();
    return reply
      .header("content-type", "application/json; charset=utf-8")
      .header("content-disposition", `attachment; filename="${EXPORT_FILENAME}"`)
      .send(bytes);
  });
}
