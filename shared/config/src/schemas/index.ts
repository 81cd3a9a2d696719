/**
 * Zod Schema Validation for Engine Config
 *
 * Validated once at startup (loadEngineConfig). Once a config passes, the
 * engine trusts it for the life of the process.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Ethereum address schema (0x + 40 hex chars).
 */
export const EthereumAddressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid Ethereum address format');

/**
 * RPC URL schema (HTTP or HTTPS).
 */
export const RpcUrlSchema = z
  .string()
  .regex(/^https?:\/\//, 'RPC URL must start with http:// or https://');

export const UrlSchema = z.string().url('Invalid URL format');

/**
 * Basis points (0-10000).
 * 100 bps = 1%, 10000 bps = 100%
 */
export const BasisPointsSchema = z
  .number()
  .int()
  .min(0, 'Basis points cannot be negative')
  .max(10000, 'Basis points cannot exceed 10000 (100%)');

export const PositiveIntSchema = z
  .number()
  .int()
  .positive('Value must be a positive integer');

export const NonNegativeIntSchema = z
  .number()
  .int()
  .min(0, 'Value cannot be negative');

/**
 * Chain identifiers are strings internally; JSON files often carry numbers.
 */
export const ChainIdSchema = z
  .union([z.string().min(1, 'Chain id is required'), PositiveIntSchema])
  .transform(value => String(value));

// =============================================================================
// Chain Configuration
// =============================================================================

export const RetryBackoffSchema = z.object({
  initialDelayMs: PositiveIntSchema.default(100),
  maxDelayMs: PositiveIntSchema.default(5000),
  backoffMultiplier: z.number().min(1, 'Backoff multiplier must be >= 1').default(2),
});

/**
 * Per-chain configuration. Every tunable has a default so a minimal entry
 * needs only chainId and rpcUrl.
 */
export const ChainConfigSchema = z.object({
  chainId: ChainIdSchema,
  name: z.string().min(1).optional(),
  rpcUrl: RpcUrlSchema.describe('JSON-RPC endpoint URL'),

  // Worker pool
  perAccountConcurrency: PositiveIntSchema.default(1),
  maxConcurrent: PositiveIntSchema.optional().describe('Cap on active pipelines per chain (unbounded if unset)'),
  maxQueueSize: PositiveIntSchema.optional().describe('Intake queue bound (unbounded if unset)'),
  warmAccounts: z.array(EthereumAddressSchema).default([]),
  drainTimeoutMs: PositiveIntSchema.default(30_000),

  // Nonce allocation
  maxUnconfirmedReservations: PositiveIntSchema.default(16),
  reconcileIntervalMs: PositiveIntSchema.default(30_000),
  reconcileTimeoutMs: PositiveIntSchema.default(5_000),

  // Retry caps
  reserveRetryAttempts: NonNegativeIntSchema.default(5),
  simulationRetryCap: PositiveIntSchema.default(3),
  broadcastRetryCap: PositiveIntSchema.default(3),
  retryBackoff: RetryBackoffSchema.default({}),

  // Timeouts
  simulationTimeoutMs: PositiveIntSchema.default(10_000),
  broadcastTimeoutMs: PositiveIntSchema.default(10_000),
  pollIntervalMs: PositiveIntSchema.default(2_000),
  pollTimeoutMs: PositiveIntSchema.default(5_000),
  confirmationTimeoutMs: PositiveIntSchema.default(120_000),

  // Gas
  gasBufferBps: BasisPointsSchema.default(2000),
});

// =============================================================================
// Engine Configuration
// =============================================================================

export const AlertConfigSchema = z.object({
  slackWebhookUrl: UrlSchema.optional(),
  discordWebhookUrl: UrlSchema.optional(),
  /** Per-channel circuit breaker: failures before the channel is skipped */
  circuitFailureThreshold: PositiveIntSchema.default(3),
  circuitResetMs: PositiveIntSchema.default(60_000),
  historySize: PositiveIntSchema.default(100),
});

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export const EngineConfigSchema = z
  .object({
    port: z.number().int().min(1).max(65535).default(3000),
    logLevel: LogLevelSchema.default('info'),
    archiveSize: PositiveIntSchema.default(1000),
    chains: z.array(ChainConfigSchema).min(1, 'At least one chain must be configured'),
    alerts: AlertConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.chains.forEach((chain, index) => {
      if (seen.has(chain.chainId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['chains', index, 'chainId'],
          message: `Duplicate chain id ${chain.chainId}`,
        });
      }
      seen.add(chain.chainId);
    });
  });

export type ChainConfig = z.output<typeof ChainConfigSchema>;
export type ChainConfigInput = z.input<typeof ChainConfigSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Format zod issues as "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e: z.ZodIssue) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`);
}
