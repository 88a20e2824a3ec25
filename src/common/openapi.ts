import type { OpenAPIV3 } from "openapi-types";

const json = (ref: string) => ({
  "application/json": {
    schema: { $ref: `#/components/schemas/${ref}` }
  }
});

const errorResponses = {
  "400": { description: "Invalid request or amount", content: json("Error") },
  "503": { description: "Ledger storage unavailable", content: json("Error") }
};

export const openapiDocument = {
  openapi: "3.0.3",
  info: {
    title: "User Ledger API",
    description:
      "Per-user deposit and withdrawal ledger. Summaries are rebuilt from the full transaction log on every write.",
    version: "1.0.0"
  },
  paths: {
    "/health": {
      get: {
        summary: "Health check",
        responses: {
          "200": { description: "OK", content: json("Health") }
        }
      }
    },
    "/health/store": {
      get: {
        summary: "Ledger storage probe",
        responses: {
          "200": { description: "OK", content: json("Health") }
        }
      }
    },
    "/users/{userId}/deposits": {
      post: {
        summary: "Record a deposit",
        parameters: [{ $ref: "#/components/parameters/UserId" }],
        requestBody: { required: true, content: json("AmountBody") },
        responses: {
          "201": { description: "Recorded", content: json("TransactionResult") },
          ...errorResponses
        }
      }
    },
    "/users/{userId}/withdrawals": {
      post: {
        summary: "Record a withdrawal",
        parameters: [{ $ref: "#/components/parameters/UserId" }],
        requestBody: { required: true, content: json("AmountBody") },
        responses: {
          "201": { description: "Recorded", content: json("TransactionResult") },
          ...errorResponses
        }
      }
    },
    "/users/{userId}/balance": {
      get: {
        summary: "Balance and ROI",
        parameters: [{ $ref: "#/components/parameters/UserId" }],
        responses: {
          "200": { description: "OK", content: json("Balance") },
          ...errorResponses
        }
      }
    },
    "/users/{userId}/stats": {
      get: {
        summary: "Aggregate statistics",
        parameters: [{ $ref: "#/components/parameters/UserId" }],
        responses: {
          "200": { description: "OK", content: json("Stats") },
          ...errorResponses
        }
      }
    },
    "/users/{userId}/history": {
      get: {
        summary: "Most recent transactions first",
        parameters: [
          { $ref: "#/components/parameters/UserId" },
          { $ref: "#/components/parameters/Limit" }
        ],
        responses: {
          "200": { description: "OK", content: json("History") },
          ...errorResponses
        }
      }
    },
    "/users/{userId}/transactions": {
      delete: {
        summary: "Delete every transaction of the user",
        parameters: [{ $ref: "#/components/parameters/UserId" }],
        responses: {
          "200": { description: "Deleted", content: json("ResetResult") },
          ...errorResponses
        }
      }
    },
    "/export": {
      get: {
        summary: "Download the ledger workbook",
        responses: {
          "200": {
            description: "Workbook with the Transactions and Summary tables",
            content: json("Workbook")
          },
          "503": errorResponses["503"]
        }
      }
    }
  },
  components: {
    parameters: {
      UserId: {
        name: "userId",
        in: "path",
        required: true,
        schema: { type: "integer", format: "int64" }
      },
      Limit: {
        name: "limit",
        in: "query",
        required: false,
        schema: { type: "integer", minimum: 1, maximum: 100, default: 10 }
      }
    },
    schemas: {
      Health: {
        type: "object",
        properties: {
          status: { type: "string", enum: ["ok", "down", "skipped"] },
          latency: { type: "integer" }
        },
        required: ["status"]
      },
      Error: {
        type: "object",
        properties: {
          error: { type: "string" },
          message: { type: "string" }
        },
        required: ["error", "message"]
      },
      AmountBody: {
        type: "object",
        properties: {
          amount: {
            oneOf: [{ type: "string", example: "1000,50" }, { type: "number" }]
          }
        },
        required: ["amount"]
      },
      Transaction: {
        type: "object",
        properties: {
          userId: { type: "integer", format: "int64" },
          type: { type: "string", enum: ["deposit", "withdraw"] },
          amount: { type: "string", example: "1000.00" },
          timestamp: { type: "string", example: "2024-01-01 12:00:00" }
        },
        required: ["userId", "type", "amount", "timestamp"]
      },
      TransactionResult: {
        type: "object",
        properties: {
          transaction: { $ref: "#/components/schemas/Transaction" },
          balance: { type: "string" },
          roiPercent: { type: "string" }
        },
        required: ["transaction", "balance", "roiPercent"]
      },
      Balance: {
        type: "object",
        properties: {
          userId: { type: "integer", format: "int64" },
          balance: { type: "string" },
          roiPercent: { type: "string" }
        },
        required: ["userId", "balance", "roiPercent"]
      },
      Stats: {
        type: "object",
        properties: {
          userId: { type: "integer", format: "int64" },
          deposits: { type: "string" },
          withdrawals: { type: "string" },
          balance: { type: "string" },
          roiPercent: { type: "string" },
          pnl: { type: "string" },
          outcome: { type: "string", enum: ["profit", "loss"] }
        },
        required: ["userId", "deposits", "withdrawals", "balance", "roiPercent", "pnl", "outcome"]
      },
      History: {
        type: "object",
        properties: {
          userId: { type: "integer", format: "int64" },
          entries: {
            type: "array",
            items: {
              type: "object",
              properties: {
                type: { type: "string", enum: ["deposit", "withdraw"] },
                amount: { type: "string" },
                timestamp: { type: "string" }
              },
              required: ["type", "amount", "timestamp"]
            }
          }
        },
        required: ["userId", "entries"]
      },
      ResetResult: {
        type: "object",
        properties: {
          userId: { type: "integer", format: "int64" },
          removed: { type: "integer" }
        },
        required: ["userId", "removed"]
      },
      Workbook: {
        type: "object",
        properties: {
          format: { type: "string", enum: ["ledger-workbook"] },
          version: { type: "integer", enum: [1] },
          sheets: {
            type: "array",
            items: {
              type: "object",
              properties: {
                name: { type: "string", enum: ["Transactions", "Summary"] },
                rows: {
                  type: "array",
                  items: {
                    type: "array",
                    items: { oneOf: [{ type: "string" }, { type: "number" }] }
                  }
                }
              },
              required: ["name", "rows"]
            }
          }
        },
        required: ["format", "version", "sheets"]
      }
    }
  }
} satisfies OpenAPIV3.Document;
