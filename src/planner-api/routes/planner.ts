// src/planner-api/routes/planner.ts
import { Router } from 'express';
import { recommend } from '@core/recommendation';
import { deriveCostDefaults } from '@core/cost-calculator';
import { recommendRequestSchema, validateInput } from '@core/inputs';
import type { PlannerContext } from '../context';

export function plannerRouter(ctx: PlannerContext): Router {
  const router = Router();

  // POST /planner/recommend -- ad-hoc recommendation for one answer set
  router.post('/recommend', (req, res) => {
    const parsed = validateInput(recommendRequestSchema, req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error });
    }

    const { questions, recommendations } = ctx.rulePack;
    const result = recommend(parsed.data.answers, questions, recommendations, ctx.random);
    res.json({ success: true, data: { ...result, costDefaults: deriveCostDefaults(result) } });
  });

  return router;
}
