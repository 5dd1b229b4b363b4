/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. The schemas
 * check shape only; the ledger enforces its own rules (non-empty names,
 * whole-number amounts, day range) so those failures carry its codes.
 */

import { z } from "zod";
import { isIsoDate } from "@kakeibo/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const IsoDateSchema = z
  .string()
  .refine(isIsoDate, { message: "Expected a calendar date as YYYY-MM-DD" });

export const PeriodSchema = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, "Expected a period as YYYY-MM");

// =============================================================================
// Account DTOs
// =============================================================================

export const CreateAccountSchema = z.object({
  name: z.string(),
  balance: z.number().default(0),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

// =============================================================================
// Transaction DTOs
// =============================================================================

export const CreateTransactionSchema = z.object({
  date: IsoDateSchema.optional(),
  account: z.string(),
  amount: z.number(),
  memo: z.string().optional(),
});

export type CreateTransactionDto = z.infer<typeof CreateTransactionSchema>;

export const ListTransactionsQuerySchema = z.object({
  period: PeriodSchema.optional(),
  account: z.string().optional(),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

// =============================================================================
// Fixed Cost DTOs
// =============================================================================

export const CreateFixedCostSchema = z.object({
  name: z.string(),
  account: z.string(),
  amount: z.number(),
  memo: z.string().optional(),
  day: z.number(),
});

export type CreateFixedCostDto = z.infer<typeof CreateFixedCostSchema>;

/**
 * `date` is passed through as given; the ledger rejects anything that is
 * not a calendar date with INVALID_DATE.
 */
export const ApplyFixedCostsSchema = z.object({
  date: z.string().optional(),
});

export type ApplyFixedCostsDto = z.infer<typeof ApplyFixedCostsSchema>;

// =============================================================================
// Summary DTOs
// =============================================================================

export const SummaryQuerySchema = z.object({
  period: PeriodSchema.optional(),
});

export type SummaryQuery = z.infer<typeof SummaryQuerySchema>;
