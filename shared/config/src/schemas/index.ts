/**
 * Zod Schema Validation for Config Objects
 *
 * Runtime validation for the JSON data tables and for opportunities arriving
 * from scanners. Tables are validated once at module load; opportunities once
 * at normalization. Nothing is re-validated on the execution path.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Percentage as decimal (0-1).
 */
export const PercentageDecimalSchema = z
  .number()
  .min(0, 'Percentage cannot be negative')
  .max(1, 'Percentage cannot exceed 1 (100%)');

/**
 * Positive integer.
 */
export const PositiveIntSchema = z.number().int().positive();

/**
 * Non-negative finite number.
 */
export const NonNegativeNumberSchema = z.number().finite().min(0);

export const ChainClassSchema = z.enum(['l2', 'mainnet']);

export const GasTierSchema = z.enum(['ultra_low', 'low', 'medium', 'high', 'extreme']);

export const OperationClassSchema = z.enum(['same_chain', 'cross_chain', 'flash_loan', 'complex']);

// =============================================================================
// Data Table Schemas
// =============================================================================

/**
 * One chain's execution metadata.
 */
export const ChainProfileSchema = z.object({
  chainClass: ChainClassSchema,
  nativeAsset: z.string().min(1),
  /** Native amount always kept back for gas */
  gasReserveNative: NonNegativeNumberSchema,
  /** Venue used for just-in-time conversions */
  conversionVenue: z.string().min(1),
  /** Non-native assets the wallet may hold on this chain */
  assets: z.array(z.string().min(1)),
});

export const ChainProfilesSchema = z.record(z.string(), ChainProfileSchema);

export const GasTierEntrySchema = z.object({
  maxGwei: z.number().positive(),
  /** null means the tier never trades */
  minProfitUsd: NonNegativeNumberSchema.nullable(),
});

const TierTableSchema = z.object({
  ultra_low: GasTierEntrySchema,
  low: GasTierEntrySchema,
  medium: GasTierEntrySchema,
  high: GasTierEntrySchema,
  extreme: GasTierEntrySchema,
});

const PerOperationSchema = z.object({
  same_chain: NonNegativeNumberSchema,
  cross_chain: NonNegativeNumberSchema,
  flash_loan: NonNegativeNumberSchema,
  complex: NonNegativeNumberSchema,
});

export const GasTierFileSchema = z.object({
  tiers: z.object({
    mainnet: TierTableSchema,
    l2: TierTableSchema,
  }),
  gasUnits: PerOperationSchema,
  l2FlatCostUsd: PerOperationSchema,
});

export const VenueProfileSchema = z.object({
  avgExecutionTimeSec: z.number().positive(),
  reliability: z.number().min(0.1).max(0.99),
});

export const VenueProfilesSchema = z.record(z.string(), VenueProfileSchema);

export const BridgeProfileSchema = z.object({
  /** Fee as a percentage of the transferred amount (0.05 = 0.05%) */
  feePct: NonNegativeNumberSchema,
  speedMinutes: z.number().positive(),
  timeoutMinutes: z.number().positive(),
  chains: z.array(z.string().min(1)).min(2),
  tokens: z.array(z.string().min(1)).min(1),
  enabled: z.boolean().default(true),
});

export const BridgeProfilesSchema = z.record(z.string(), BridgeProfileSchema);

export const TokenDecimalsSchema = z.record(z.string(), z.number().int().min(0).max(36));

export const ReserveFileSchema = z.object({
  conversionPriority: z.array(z.array(z.string().min(1)).min(1)).min(1),
  defaultMinReserveUsd: NonNegativeNumberSchema,
  assetMinReserveUsd: z.record(z.string(), NonNegativeNumberSchema),
});

// =============================================================================
// Opportunity Schema
// =============================================================================

/**
 * Opportunity produced by an external scanner.
 */
export const OpportunityInputSchema = z.object({
  id: z.string().min(1),
  token: z.string().min(1),
  buyChain: z.string().min(1),
  sellChain: z.string().min(1),
  buyVenue: z.string().min(1),
  sellVenue: z.string().min(1),
  buyPrice: z.number().positive(),
  sellPrice: z.number().positive(),
  discoveredAt: z.number().int().nonnegative(),
  grossProfitUsd: z.number().finite(),
  volatility: NonNegativeNumberSchema.optional(),
  executionWindowMs: PositiveIntSchema.optional(),
  bridgeFeeUsd: NonNegativeNumberSchema.optional(),
});

// =============================================================================
// Inferred Types
// =============================================================================

export type ChainProfile = z.infer<typeof ChainProfileSchema>;
export type GasTierEntry = z.infer<typeof GasTierEntrySchema>;
export type GasTierFile = z.infer<typeof GasTierFileSchema>;
export type BridgeProfile = z.infer<typeof BridgeProfileSchema>;
export type ReserveFile = z.infer<typeof ReserveFileSchema>;
export type ValidatedOpportunityInput = z.infer<typeof OpportunityInputSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Result of validation with detailed error information.
 */
export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: Array<{
    path: string;
    message: string;
  }>;
}

/**
 * Validate data against a schema and return detailed results.
 * Does not throw - returns validation result.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 * Use at startup/load time, not in hot paths.
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param context - Context string for error message
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  const errorDetails = result.error.errors
    .map((e: z.ZodIssue) => `  - ${e.path.join('.')}: ${e.message}`)
    .join('\n');

  throw new Error(
    `Config validation failed for ${context}:\n${errorDetails}`
  );
}

/**
 * Create a validator function for a specific schema.
 */
export function createValidator<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  context: string
): (data: unknown) => T {
  return (data: unknown) => validateOrThrow(schema, data, context);
}

export const validateOpportunityInput = createValidator(OpportunityInputSchema, 'OpportunityInput');
