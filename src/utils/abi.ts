import { decodeAbiParameters, encodeAbiParameters, type Address, type Hex } from 'viem';
import type { Command, CommandType, SwapParams } from '../domain/types';
import { ValidationError, reasonOf } from '../domain/errors';
import { SWAP_ROUTER_SLOTS, type SwapRouterSlot } from '../config/constants';

// Wire codes are positional: supply=0 ... swap=4.
export const COMMAND_TYPES = ['supply', 'withdraw', 'borrow', 'repay', 'swap'] as const satisfies readonly CommandType[];

const commandListAbi = [
  {
    name: 'commands',
    type: 'tuple[]',
    components: [
      { name: 'cmdType', type: 'uint8' },
      { name: 'data', type: 'bytes' },
    ],
  },
] as const;

const assetAmountAbi = [
  { name: 'asset', type: 'address' },
  { name: 'amount', type: 'uint256' },
] as const;

const swapAbi = [
  { name: 'router', type: 'uint8' },
  { name: 'tokenIn', type: 'address' },
  { name: 'amountIn', type: 'uint256' },
  { name: 'tokenOut', type: 'address' },
  { name: 'minAmountOut', type: 'uint256' },
  { name: 'maxOracleSlippageBps', type: 'uint256' },
  { name: 'payload', type: 'bytes' },
] as const;

const routeAbi = [
  { name: 'tokenIn', type: 'address' },
  { name: 'amountIn', type: 'uint256' },
  { name: 'tokenOut', type: 'address' },
  { name: 'amountOut', type: 'uint256' },
] as const;

export interface RoutePayload {
  tokenIn: Address;
  amountIn: bigint;
  tokenOut: Address;
  amountOut: bigint;
}

export function commandCode(type: CommandType): number {
  return COMMAND_TYPES.indexOf(type);
}

export function routerSlotCode(slot: SwapRouterSlot): number {
  return SWAP_ROUTER_SLOTS.indexOf(slot);
}

export function routerSlotFromCode(code: number): SwapRouterSlot {
  if (!Number.isInteger(code) || code < 0 || code >= SWAP_ROUTER_SLOTS.length) {
    throw new ValidationError('InvalidRouter', `Unknown swap router slot ${code}`, { router: String(code) });
  }
  return SWAP_ROUTER_SLOTS[code];
}

function encodeCommandData(command: Command): Hex {
  if (command.type === 'swap') {
    const s = command.swap;
    return encodeAbiParameters(swapAbi, [
      routerSlotCode(s.router),
      s.tokenIn,
      s.amountIn,
      s.tokenOut,
      s.minAmountOut,
      s.maxOracleSlippageBps,
      s.payload,
    ]);
  }
  return encodeAbiParameters(assetAmountAbi, [command.asset, command.amount]);
}

// tuple(uint8 cmdType, bytes data)[]
export function encodeCommands(commands: readonly Command[]): Hex {
  return encodeAbiParameters(commandListAbi, [
    commands.map((command) => ({ cmdType: commandCode(command.type), data: encodeCommandData(command) })),
  ]);
}

function malformed(what: string, err: unknown): ValidationError {
  return new ValidationError('MalformedPayload', `Could not decode ${what}: ${reasonOf(err)}`);
}

function decodeSwap(data: Hex): SwapParams {
  let fields: readonly [number, Address, bigint, Address, bigint, bigint, Hex];
  try {
    fields = decodeAbiParameters(swapAbi, data);
  } catch (err) {
    throw malformed('swap command', err);
  }
  const [router, tokenIn, amountIn, tokenOut, minAmountOut, maxOracleSlippageBps, payload] = fields;
  return { router: routerSlotFromCode(router), tokenIn, amountIn, tokenOut, minAmountOut, maxOracleSlippageBps, payload };
}

function decodeCommand(cmdType: number, data: Hex, index: number): Command {
  if (cmdType >= COMMAND_TYPES.length) {
    throw new ValidationError('UnknownCommand', `Unknown command type ${cmdType} at index ${index}`, {
      index: String(index),
      cmdType: String(cmdType),
    });
  }
  const type = COMMAND_TYPES[cmdType];
  if (type === 'swap') return { type, swap: decodeSwap(data) };
  try {
    const [asset, amount] = decodeAbiParameters(assetAmountAbi, data);
    return { type, asset, amount };
  } catch (err) {
    throw malformed(`${type} command`, err);
  }
}

export function decodeCommands(data: Hex): Command[] {
  let entries: readonly { cmdType: number; data: Hex }[];
  try {
    [entries] = decodeAbiParameters(commandListAbi, data);
  } catch (err) {
    throw malformed('command list', err);
  }
  return entries.map((entry, index) => decodeCommand(entry.cmdType, entry.data, index));
}

export function encodeRoutePayload(route: RoutePayload): Hex {
  return encodeAbiParameters(routeAbi, [route.tokenIn, route.amountIn, route.tokenOut, route.amountOut]);
}

export function decodeRoutePayload(payload: Hex): RoutePayload {
  try {
    const [tokenIn, amountIn, tokenOut, amountOut] = decodeAbiParameters(routeAbi, payload);
    return { tokenIn, amountIn, tokenOut, amountOut };
  } catch (err) {
    throw malformed('route payload', err);
  }
}
