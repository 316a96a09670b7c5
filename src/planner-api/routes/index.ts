import { Router } from 'express';
import type { PlannerContext } from '../context';
import { healthRouter } from './health';
import { rulePackRouter } from './rule-pack';
import { plannerRouter } from './planner';
import { totalsRouter } from './totals';
import { costsRouter } from './costs';
import { sessionsRouter } from './sessions';

export function apiRouter(ctx: PlannerContext): Router {
  const router = Router();
  router.use(healthRouter(ctx));
  router.use('/rule-pack', rulePackRouter(ctx));
  router.use('/planner', plannerRouter(ctx));
  router.use('/totals', totalsRouter);
  router.use('/costs', costsRouter(ctx));
  router.use('/sessions', sessionsRouter(ctx));
  return router;
}
