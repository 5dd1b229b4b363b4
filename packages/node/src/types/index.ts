/**
 * Type barrel — re-exports all public types from @kakeibo/node.
 */

// DTOs
export {
  IsoDateSchema,
  PeriodSchema,
  CreateAccountSchema,
  CreateTransactionSchema,
  ListTransactionsQuerySchema,
  CreateFixedCostSchema,
  ApplyFixedCostsSchema,
  SummaryQuerySchema,
} from "./dto.js";
export type {
  CreateAccountDto,
  CreateTransactionDto,
  ListTransactionsQuery,
  CreateFixedCostDto,
  ApplyFixedCostsDto,
  SummaryQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, ValidatedBodyEnv } from "./api-contract.js";
