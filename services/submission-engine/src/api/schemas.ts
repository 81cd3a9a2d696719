/**
 * Request body schemas. Amounts arrive as decimal strings (or safe integers)
 * and leave validation as bigint.
 */

import { z } from 'zod';
import { ChainIdSchema, EthereumAddressSchema } from '@txcore/config';
import type { SubmissionInput } from '@txcore/types';

const WeiSchema = z
  .union([
    z.string().regex(/^\d+$/, 'Amount must be a non-negative decimal integer string'),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform(value => BigInt(value));

const HexDataSchema = z.string().regex(/^0x([0-9a-fA-F]{2})*$/, 'Calldata must be 0x-prefixed hex bytes');

export const SubmissionBodySchema = z.object({
  id: z.string().min(1).max(128).optional(),
  chainId: ChainIdSchema,
  account: EthereumAddressSchema,
  payload: z.object({
    to: EthereumAddressSchema,
    data: HexDataSchema.optional(),
    value: WeiSchema.optional(),
  }),
  constraints: z
    .object({
      maxValue: WeiSchema.optional(),
      gasCeiling: WeiSchema.optional(),
      maxCost: WeiSchema.optional(),
    })
    .optional(),
});

export const TestAlertBodySchema = z.object({
  message: z.string().min(1).max(500).default('Test alert from submission engine'),
  severity: z.enum(['low', 'warning', 'high', 'critical']).default('low'),
});

export function toSubmissionInput(body: z.output<typeof SubmissionBodySchema>): SubmissionInput {
  return {
    id: body.id,
    chainId: body.chainId,
    account: body.account,
    payload: body.payload,
    constraints: body.constraints,
  };
}
