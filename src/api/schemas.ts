import { getAddress, isAddress, isHex, type Address, type Hex } from 'viem';
import { z } from 'zod';
import type { Command } from '../domain/types';
import { SWAP_ROUTER_SLOTS } from '../config/constants';
import { decodeCommands } from '../utils/abi';
import { isZeroAddress } from '../utils/address';

// Request bodies. Amounts are base-unit integers, sent as strings or safe integers.

export const AddressSchema = z
  .string()
  .refine((v): v is Address => isAddress(v, { strict: false }), { message: 'Invalid address' })
  .transform((v) => getAddress(v));

export const HexSchema = z.string().refine((v): v is Hex => isHex(v), { message: 'Invalid hex string' });

export const AmountSchema = z
  .union([z.string().regex(/^\d+$/, 'Expected a non-negative integer string'), z.number().int().nonnegative().safe()])
  .transform((v) => BigInt(v));

// A zero address means "no flash loan", matching the wire convention.
const FlashLoanTokenSchema = AddressSchema.nullable()
  .optional()
  .transform((v) => (v === undefined || v === null || isZeroAddress(v) ? null : v));

function assetCommand<T extends 'supply' | 'withdraw' | 'borrow' | 'repay'>(type: T) {
  return z.object({ type: z.literal(type), asset: AddressSchema, amount: AmountSchema });
}

const SwapCommandSchema = z.object({
  type: z.literal('swap'),
  swap: z.object({
    router: z.enum(SWAP_ROUTER_SLOTS),
    tokenIn: AddressSchema,
    amountIn: AmountSchema,
    tokenOut: AddressSchema,
    minAmountOut: AmountSchema,
    maxOracleSlippageBps: AmountSchema,
    payload: HexSchema,
  }),
});

export const CommandSchema = z.discriminatedUnion('type', [
  assetCommand('supply'),
  assetCommand('withdraw'),
  assetCommand('borrow'),
  assetCommand('repay'),
  SwapCommandSchema,
]);

// Commands arrive either as JSON objects or as the ABI-encoded command list.
const CommandsSchema = z
  .union([z.array(CommandSchema), HexSchema.transform((hex): Command[] => decodeCommands(hex))])
  .optional()
  .transform((v): Command[] => v ?? []);

const FlashTermsSchema = z.object({
  flashLoanToken: FlashLoanTokenSchema,
  providedAmount: AmountSchema.default(0),
  expectedAmount: AmountSchema.default(0),
  commands: CommandsSchema,
});

export const DepositBodySchema = FlashTermsSchema.extend({
  depositToken: AddressSchema,
  depositAmount: AmountSchema,
});

export const WithdrawBodySchema = FlashTermsSchema.extend({
  percentage: AmountSchema,
  outputToken: AddressSchema,
});

export const RebalanceBodySchema = FlashTermsSchema;

const PlanOptionsSchema = z.object({
  router: z.enum(SWAP_ROUTER_SLOTS).default('kyberswap'),
  slippageBps: z.number().int().min(0).max(10_000).optional(),
  maxOracleSlippageBps: z.number().int().min(0).max(10_000).optional(),
  execute: z.boolean().default(false),
});

export const LeveragePlanBodySchema = PlanOptionsSchema.extend({
  equityAmount: AmountSchema,
  flashAmount: AmountSchema.default(0),
});

export const UnwindPlanBodySchema = PlanOptionsSchema.extend({
  percentage: AmountSchema,
});
