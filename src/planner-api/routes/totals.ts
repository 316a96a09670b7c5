import { Router } from 'express';
import { computeTotals } from '@core/totals';
import { totalsRequestSchema, validateInput } from '@core/inputs';

const router = Router();

// POST /totals/compute -- totals for a snapshot sent in full
router.post('/compute', (req, res) => {
  const parsed = validateInput(totalsRequestSchema, req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: parsed.error });
  }
  res.json({ success: true, data: computeTotals(parsed.data.snapshot) });
});

export { router as totalsRouter };
