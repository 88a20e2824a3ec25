import { z } from "zod";

export const userParamsSchema = z.object({
  userId: z.coerce
    .number()
    .int()
    .refine(Number.isSafeInteger, "User id must be a safe integer")
});

// Raw text is parsed by parseAmount so that "1000,50" is accepted.
export const amountBodySchema = z.object({
  amount: z
    .union([z.string().trim().min(1).max(64), z.number().finite()])
    .transform((value) => String(value))
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(100).default(10)
});

export type UserParams = z.infer<typeof userParamsSchema>;
export type AmountBody = z.infer<typeof amountBodySchema>;
export type HistoryQuery = z.infer<typeof historyQuerySchema>;
