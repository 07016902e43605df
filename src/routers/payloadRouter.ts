import type { Address, Hex } from 'viem';
import type { TokenLedger } from '../chain/ledger';
import type { SwapRouter } from '../domain/types';
import { ExternalCallError } from '../domain/errors';
import { decodeRoutePayload } from '../utils/abi';
import { applyBpsHaircut } from '../utils/math';

/**
 * Reference exchange: fills the route encoded in the payload from its own
 * inventory. `haircutBps` models execution worse than the quoted route.
 */
export class PayloadRouter implements SwapRouter {
  private haircutBps: bigint;

  constructor(
    readonly address: Address,
    private readonly ledger: TokenLedger,
    haircutBps = 0n,
  ) {
    this.haircutBps = haircutBps;
  }

  setHaircut(bps: bigint): void {
    this.haircutBps = bps;
  }

  execute(caller: Address, payload: Hex): void {
    const route = decodeRoutePayload(payload);
    const amountOut = applyBpsHaircut(route.amountOut, this.haircutBps);
    const inventory = this.ledger.balanceOf(route.tokenOut, this.address);
    if (inventory < amountOut) {
      throw new ExternalCallError('SwapFailed', 'Router inventory too low', {
        tokenOut: route.tokenOut,
        inventory: inventory.toString(),
        needed: amountOut.toString(),
      });
    }
    this.ledger.transferFrom(route.tokenIn, this.address, caller, this.address, route.amountIn);
    this.ledger.transfer(route.tokenOut, this.address, caller, amountOut);
  }
}
