import { Router } from 'express';
import type { PlannerContext } from '../context';

export function healthRouter(ctx: PlannerContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      success: true,
      data: { status: 'ok', packId: ctx.rulePack.meta.packId },
    });
  });

  return router;
}
