import { Hono } from 'hono';
import type { Runtime } from '../../services/runtime';
import { buildLeveragePlan, buildUnwindPlan, type PlanTarget } from '../../services/planBuilder';
import type { World } from '../../services/world';
import type { SwapRouterSlot } from '../../config/constants';
import { encodeCommands } from '../../utils/abi';
import { logger } from '../../utils/logger';
import { jsonRespond } from '../utils/respond';
import { LeveragePlanBodySchema, UnwindPlanBodySchema } from '../schemas';
import { describeStrategy } from './strategy';

function planTarget(world: World, router: SwapRouterSlot): PlanTarget {
  return { oracle: world.strategy.priceOracle, ledger: world.ledger, adapter: world.adapter, router };
}

// Operator-side plan construction. With `execute: true` the plan is submitted through the parent.
export function plansRoute(runtime: Runtime) {
  const route = new Hono();

  route.post('/leverage', async (c) => {
    const body = LeveragePlanBodySchema.parse(await c.req.json());
    const world = runtime.world();
    const plan = buildLeveragePlan(planTarget(world, body.router), body);
    const encoded = encodeCommands(plan.request.commands);
    if (!body.execute) return jsonRespond(c, { plan, encodedCommands: encoded, executed: false });

    logger.section('Executing leverage plan');
    world.parent.deposit(plan.request);
    return jsonRespond(c, { plan, encodedCommands: encoded, executed: true, strategy: describeStrategy(world) });
  });

  route.post('/unwind', async (c) => {
    const body = UnwindPlanBodySchema.parse(await c.req.json());
    const world = runtime.world();
    const plan = buildUnwindPlan(planTarget(world, body.router), body);
    const encoded = encodeCommands(plan.request.commands);
    if (!body.execute) return jsonRespond(c, { plan, encodedCommands: encoded, executed: false });

    logger.section('Executing unwind plan');
    const actualWithdrawn = world.parent.withdraw(plan.request);
    return jsonRespond(c, {
      plan,
      encodedCommands: encoded,
      executed: true,
      actualWithdrawn,
      strategy: describeStrategy(world),
    });
  });

  return route;
}
