import { describe, it, expect, beforeAll } from 'vitest';
import path from 'path';
import {
  computeBenefits,
  computeHomeDecision,
  computeHomeMods,
  computePanel,
  findUnknownModItems,
  findUnknownVaTiers,
  isHouseholdPanel,
  type HomeDecisionInput,
} from '@core/household';
import { costTableSchema, loadRulePack, type CostTable } from '@core/rule-pack';
import { computeTotals } from '@core/totals';

const PACK_DIR = path.resolve('rule-packs/senior-care-v1');

let table: CostTable;

beforeAll(async () => {
  table = (await loadRulePack(PACK_DIR)).costs;
});

const home: HomeDecisionInput = {
  decision: 'keep',
  mortgage: 1200,
  heloc: 400,
  propertyTax: 300,
  insurance: 100,
  hoa: 50,
  utilities: 250,
  salePrice: 0,
  payoff: 0,
  applyProceeds: true,
};

describe('computeHomeDecision', () => {
  it('adds the mortgage to the carrying costs when keeping the home', () => {
    const result = computeHomeDecision(home, table);
    expect(result.monthlyTotal).toBe(1900);
    expect(result.snapshot).toEqual({
      home_monthly_total: 1900,
      home_sale_net_proceeds: 0,
      apply_home_proceeds: true,
    });
  });

  it('swaps the mortgage for the HELOC payment', () => {
    expect(computeHomeDecision({ ...home, decision: 'heloc' }, table).monthlyTotal).toBe(1100);
  });

  it('keeps only the carrying costs under a reverse mortgage', () => {
    expect(computeHomeDecision({ ...home, decision: 'reverse_mortgage' }, table).monthlyTotal).toBe(
      700,
    );
  });

  it('nets the sale price after payoff and the default fee', () => {
    const result = computeHomeDecision(
      { ...home, decision: 'sell', salePrice: 300000, payoff: 100000 },
      table,
    );
    expect(result.saleFees).toBe(18000);
    expect(result.netProceeds).toBe(182000);
    expect(result.snapshot).toEqual({
      home_monthly_total: 0,
      home_sale_net_proceeds: 182000,
      apply_home_proceeds: true,
    });
  });

  it('floors the net proceeds at zero', () => {
    const result = computeHomeDecision(
      { ...home, decision: 'sell', salePrice: 250000, payoff: 240000, feePct: 5 },
      table,
    );
    expect(result.saleFees).toBe(12500);
    expect(result.netProceeds).toBe(0);
  });

  it('leaves proceeds out of the snapshot when they are not applied', () => {
    const result = computeHomeDecision(
      { ...home, decision: 'sell', salePrice: 300000, payoff: 100000, applyProceeds: false },
      table,
    );
    expect(result.netProceeds).toBe(182000);
    expect(result.snapshot.home_sale_net_proceeds).toBe(0);
    expect(result.snapshot.apply_home_proceeds).toBe(false);
  });
});

describe('computeHomeMods', () => {
  it('amortizes the priced items over the chosen months', () => {
    const result = computeHomeMods(
      {
        payment: 'amortize',
        finish: 'Standard',
        items: { grab_bars: 2, ramp: 1 },
        months: 12,
        deductFromAssets: true,
      },
      table,
    );
    expect(result.total).toBe(5100);
    expect(result.snapshot).toEqual({
      mods_monthly_total: 425,
      mods_upfront_total: 0,
      mods_deduct_assets: false,
    });
  });

  it('rounds the monthly share', () => {
    const result = computeHomeMods(
      {
        payment: 'amortize',
        finish: 'Standard',
        items: { grab_bars: 2, ramp: 1 },
        months: 7,
        deductFromAssets: false,
      },
      table,
    );
    expect(result.monthlyTotal).toBe(729);
  });

  it('charges the total up front with the finish multiplier', () => {
    const custom = computeHomeMods(
      { payment: 'upfront', finish: 'Custom', items: { grab_bars: 1 }, months: 12, deductFromAssets: true },
      table,
    );
    expect(custom.snapshot).toEqual({
      mods_monthly_total: 0,
      mods_upfront_total: 1080,
      mods_deduct_assets: true,
    });

    const budget = computeHomeMods(
      { payment: 'upfront', finish: 'Budget', items: { grab_bars: 1 }, months: 12, deductFromAssets: false },
      table,
    );
    expect(budget.upfrontTotal).toBe(640);
    expect(budget.deductFromAssets).toBe(false);
  });

  it('truncates each item line to whole dollars', () => {
    const small = costTableSchema.parse({
      lookups: { mods_items: { rail: 333 }, mods_finish_multipliers: { Custom: 1.35 } },
    });
    const result = computeHomeMods(
      { payment: 'upfront', finish: 'Custom', items: { rail: 2 }, months: 12, deductFromAssets: true },
      small,
    );
    expect(result.total).toBe(899);
  });

  it('lists items the pack does not price', () => {
    expect(findUnknownModItems({ items: { grab_bars: 1, hot_tub: 1 } }, table)).toEqual(['hot_tub']);
  });
});

describe('computeBenefits', () => {
  it('uses the tier cap unless an actual payment is given', () => {
    const result = computeBenefits(
      {
        a: { vaTier: 'veteran_aid_attendance', hasLtc: true },
        b: { vaTier: 'surviving_spouse_aid_attendance', vaMonthly: 1200, hasLtc: false },
      },
      table,
    );
    expect(result).toMatchObject({ vaA: 2358, vaB: 1200, ltcAddA: 1800, ltcAddB: 0, total: 5358 });
    expect(result.snapshot).toEqual({
      a_va_monthly: 2358,
      b_va_monthly: 1200,
      has_ltc_insurance: true,
    });
  });

  it('reports LTC insurance when only the second person has it', () => {
    const result = computeBenefits({ a: { hasLtc: false }, b: { hasLtc: true } }, table);
    expect(result.ltcAddB).toBe(1800);
    expect(result.hasLtcInsurance).toBe(true);
    expect(result.total).toBe(1800);
  });

  it('is all zero for a single person without benefits', () => {
    const result = computeBenefits({ a: { hasLtc: false } }, table);
    expect(result.snapshot).toEqual({ a_va_monthly: 0, b_va_monthly: 0, has_ltc_insurance: false });
    expect(result.total).toBe(0);
  });

  it('lists tiers the pack does not know', () => {
    expect(
      findUnknownVaTiers({ a: { vaTier: 'admiral', hasLtc: false }, b: { hasLtc: false } }, table),
    ).toEqual(['admiral']);
  });
});

describe('computePanel', () => {
  it('recognises the household panels', () => {
    expect(isHouseholdPanel('home-mods')).toBe(true);
    expect(isHouseholdPanel('pets')).toBe(false);
  });

  it('fills defaults before computing', () => {
    const computed = computePanel('home-mods', { items: { grab_bars: 1 } }, table);
    expect(computed.success).toBe(true);
    if (!computed.success) return;
    expect(computed.result.snapshot).toEqual({
      mods_monthly_total: 67,
      mods_upfront_total: 0,
      mods_deduct_assets: false,
    });
  });

  it('reports the first invalid field', () => {
    const computed = computePanel('home-decision', { mortgage: 100 }, table);
    expect(computed.success).toBe(false);
    if (computed.success) return;
    expect(computed.error).toMatch(/^decision: /);
  });

  it('rejects unknown items and tiers', () => {
    expect(computePanel('home-mods', { items: { hot_tub: 1 } }, table)).toEqual({
      success: false,
      error: 'items: unknown item(s): hot_tub',
    });
    expect(computePanel('benefits', { a: { vaTier: 'admiral' } }, table)).toEqual({
      success: false,
      error: 'vaTier: unknown tier(s): admiral',
    });
  });

  it('feeds the totals engine through the snapshot', () => {
    const sale = computeHomeDecision(
      { ...home, decision: 'sell', salePrice: 300000, payoff: 100000 },
      table,
    );
    const mods = computeHomeMods(
      { payment: 'upfront', finish: 'Custom', items: { grab_bars: 1 }, months: 12, deductFromAssets: true },
      table,
    );
    const benefits = computeBenefits({ a: { vaTier: 'veteran_aid_attendance', hasLtc: false } }, table);
    const totals = computeTotals({ ...sale.snapshot, ...mods.snapshot, ...benefits.snapshot });
    expect(totals.assets.saleProceeds).toBe(182000);
    expect(totals.assets.modsUpfrontDeducted).toBe(1080);
    expect(totals.assets.totalEffective).toBe(180920);
    expect(totals.income.vaA).toBe(2358);
  });
});
