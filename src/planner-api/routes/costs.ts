import { Router } from 'express';
import { estimateMonthlyCost } from '@core/cost-calculator';
import { computePanel, isHouseholdPanel } from '@core/household';
import { costInputSchema, validateInput } from '@core/inputs';
import type { PlannerContext } from '../context';

export function costsRouter(ctx: PlannerContext): Router {
  const router = Router();

  // POST /costs/estimate -- monthly care cost from the pack's lookup tables
  router.post('/estimate', (req, res) => {
    const parsed = validateInput(costInputSchema, req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error });
    }
    const monthlyCost = estimateMonthlyCost(parsed.data, ctx.rulePack.costs);
    res.json({ success: true, data: { monthlyCost } });
  });

  // POST /costs/panels/:panel -- one household panel, without a session
  router.post('/panels/:panel', (req, res) => {
    const { panel } = req.params;
    if (!isHouseholdPanel(panel)) {
      return res.status(404).json({ success: false, error: `Unknown panel '${panel}'` });
    }
    const computed = computePanel(panel, req.body, ctx.rulePack.costs);
    if (!computed.success) {
      return res.status(400).json({ success: false, error: computed.error });
    }
    res.json({ success: true, data: computed.result });
  });

  return router;
}
