import type { Address } from 'viem';
import type { Command } from '../domain/types';
import { ExternalCallError, ValidationError, isStrategyError, reasonOf } from '../domain/errors';
import { isZeroAddress } from '../utils/address';
import { logger } from '../utils/logger';
import type { StrategyContext } from './context';
import { executeSwap } from './swapExecutor';

function unknownCommand(command: unknown, index: number): never {
  const tag = typeof command === 'object' && command !== null && 'type' in command ? String(command.type) : String(command);
  throw new ValidationError('UnknownCommand', `Unknown command type "${tag}" at index ${index}`, {
    index: String(index),
    type: tag,
  });
}

function requireAssetAmount(asset: Address, amount: bigint, index: number): void {
  if (isZeroAddress(asset)) {
    throw new ValidationError('InvalidToken', `Command ${index} has a zero asset`, { index: String(index) });
  }
  if (amount <= 0n) {
    throw new ValidationError('InvalidAmount', `Command ${index} has a non-positive amount`, {
      index: String(index),
      amount: amount.toString(),
    });
  }
}

// Venue hooks that fail with anything other than a StrategyError surface as ProtocolCallFailed.
export function callHook(venue: string, hook: string, fn: () => void): void {
  try {
    fn();
  } catch (err) {
    if (isStrategyError(err)) throw err;
    throw new ExternalCallError('ProtocolCallFailed', `${venue}.${hook} failed: ${reasonOf(err)}`, {
      venue,
      hook,
      reason: reasonOf(err),
    });
  }
}

/**
 * Runs `commands` in order. The first failure aborts the sequence; the caller's
 * journal frame undoes whatever already ran.
 */
export function executeCommands(ctx: StrategyContext, commands: readonly Command[]): void {
  const { adapter } = ctx;
  commands.forEach((command, index) => {
    logger.debug(`command #${index}: ${command.type}`);
    switch (command.type) {
      case 'supply':
        requireAssetAmount(command.asset, command.amount, index);
        callHook(adapter.venue, 'supply', () => adapter.supply(command.asset, command.amount));
        break;
      case 'withdraw':
        requireAssetAmount(command.asset, command.amount, index);
        callHook(adapter.venue, 'withdrawFromVenue', () => adapter.withdrawFromVenue(command.asset, command.amount));
        break;
      case 'borrow':
        requireAssetAmount(command.asset, command.amount, index);
        callHook(adapter.venue, 'borrow', () => adapter.borrow(command.asset, command.amount));
        break;
      case 'repay':
        requireAssetAmount(command.asset, command.amount, index);
        callHook(adapter.venue, 'repay', () => adapter.repay(command.asset, command.amount));
        break;
      case 'swap':
        executeSwap(ctx, command.swap);
        break;
      default: {
        const unreachable: never = command;
        unknownCommand(unreachable, index);
      }
    }
  });
}
