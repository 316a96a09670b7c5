import { Router } from 'express';
import { recommend } from '@core/recommendation';
import { deriveCostDefaults } from '@core/cost-calculator';
import { computeTotals } from '@core/totals';
import { computePanel, isHouseholdPanel } from '@core/household';
import { toSessionRecord } from '@core/session';
import { answerSetSchema, snapshotSchema, validateInput } from '@core/inputs';
import type { PlannerContext } from '../context';

const NOT_FOUND = { success: false, error: 'Session not found' } as const;

export function sessionsRouter(ctx: PlannerContext): Router {
  const router = Router();
  const { sessions } = ctx;

  // Start a planning session
  router.post('/', (_req, res) => {
    const session = sessions.create();
    res.status(201).json({ success: true, data: toSessionRecord(session) });
  });

  router.get('/:id', (req, res) => {
    const session = sessions.get(req.params.id);
    if (!session) return res.status(404).json(NOT_FOUND);
    res.json({ success: true, data: toSessionRecord(session) });
  });

  // Replace the answer set (clears any earlier recommendation)
  router.put('/:id/answers', (req, res) => {
    const parsed = validateInput(answerSetSchema, req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error });
    }
    const session = sessions.setAnswers(req.params.id, parsed.data);
    if (!session) return res.status(404).json(NOT_FOUND);
    res.json({ success: true, data: toSessionRecord(session) });
  });

  // Merge one edited panel into the financial snapshot
  router.patch('/:id/snapshot', (req, res) => {
    const parsed = validateInput(snapshotSchema, req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: parsed.error });
    }
    const session = sessions.mergePanel(req.params.id, parsed.data);
    if (!session) return res.status(404).json(NOT_FOUND);
    res.json({ success: true, data: toSessionRecord(session) });
  });

  // Compute a household panel and merge its fields into the snapshot
  router.put('/:id/panels/:panel', (req, res) => {
    const { id, panel } = req.params;
    if (!isHouseholdPanel(panel)) {
      return res.status(404).json({ success: false, error: `Unknown panel '${panel}'` });
    }
    if (!sessions.get(id)) return res.status(404).json(NOT_FOUND);
    const computed = computePanel(panel, req.body, ctx.rulePack.costs);
    if (!computed.success) {
      return res.status(400).json({ success: false, error: computed.error });
    }
    const session = sessions.mergePanel(id, computed.result.snapshot);
    if (!session) return res.status(404).json(NOT_FOUND);
    res.json({ success: true, data: { session: toSessionRecord(session), result: computed.result } });
  });

  // Run and record the recommendation for the stored answers
  router.post('/:id/recommendation', (req, res) => {
    const session = sessions.get(req.params.id);
    if (!session) return res.status(404).json(NOT_FOUND);

    const { questions, recommendations } = ctx.rulePack;
    const result = recommend(session.answers, questions, recommendations, ctx.random);
    sessions.recordRecommendation(session.id, result);
    res.json({ success: true, data: { ...result, costDefaults: deriveCostDefaults(result) } });
  });

  // Affordability picture for the current snapshot
  router.get('/:id/totals', (req, res) => {
    const session = sessions.get(req.params.id);
    if (!session) return res.status(404).json(NOT_FOUND);
    res.json({ success: true, data: computeTotals(session.snapshot) });
  });

  router.delete('/:id', (req, res) => {
    if (!sessions.delete(req.params.id)) return res.status(404).json(NOT_FOUND);
    res.status(204).end();
  });

  return router;
}
