import { Router } from 'express';
import type { ApiResponse } from '@shared/types';
import type { PlannerContext } from '../context';

export function rulePackRouter(ctx: PlannerContext): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const { meta, questions, recommendations, flagIndex } = ctx.rulePack;
    const response: ApiResponse = {
      success: true,
      data: {
        meta,
        questions: questions.map((q) => ({ id: q.id, question: q.question, answers: q.answers ?? {} })),
        decisionPrecedence: recommendations.decision_precedence,
        flags: Array.from(flagIndex).sort(),
      },
    };
    res.json(response);
  });

  return router;
}
