import { describe, it, expect } from 'vitest';
import {
  computeRunway,
  computeTotals,
  getAssetTotals,
  getCostTotals,
  getIncomeTotals,
} from '@core/totals';

// ── Income ───────────────────────────────────────────────────────────────────

describe('getIncomeTotals', () => {
  it('sums per-person parts when no aggregate is given', () => {
    const income = getIncomeTotals({ a_ss: 2000, a_pn: 500, b_ss: 1200 });
    expect(income.incA).toBe(2500);
    expect(income.incB).toBe(1200);
    expect(income.total).toBe(3700);
  });

  it('prefers the pre-aggregated figure over its parts', () => {
    const income = getIncomeTotals({ inc_A: 3000, a_ss: 2000, a_pn: 500, inc_B: 900, b_ss: 4000 });
    expect(income.incA).toBe(3000);
    expect(income.incB).toBe(900);
  });

  it('uses the parts when the aggregate is zero or blank', () => {
    expect(getIncomeTotals({ inc_A: 0, a_ss: 100 }).incA).toBe(100);
    expect(getIncomeTotals({ inc_A: '', ind_a_ss: '1,000', ind_a_other: 50 }).incA).toBe(1050);
  });

  it('builds household income from its parts and synonyms', () => {
    const income = getIncomeTotals({ hh_rent: 500, hh_investments: 200, hh_trust: '$100' });
    expect(income.incHouse).toBe(800);
  });

  it('adds VA benefits and reverse-mortgage income', () => {
    const income = getIncomeTotals({
      inc_A: 1000,
      a_va_monthly: 300,
      va_B: 200,
      rm_monthly_income: 900,
      inc_house: 150,
    });
    expect(income).toEqual({
      incA: 1000,
      incB: 0,
      incHouse: 150,
      vaA: 300,
      vaB: 200,
      rmMonthly: 900,
      total: 2550,
    });
  });
});

// ── Costs ────────────────────────────────────────────────────────────────────

describe('getCostTotals', () => {
  it('sums the four monthly cost lines', () => {
    expect(
      getCostTotals({
        care_total: 4000,
        home_monthly_total: 800,
        mods_monthly: '125',
        other_monthly_total: 75.6,
      }),
    ).toEqual({
      careTotal: 4000,
      homeMonthly: 800,
      modsMonthly: 125,
      otherMonthly: 75,
      total: 5000,
    });
  });

  it('reads the first present alias', () => {
    expect(getCostTotals({ care_total: 100, care_monthly_total: 999 }).careTotal).toBe(100);
  });
});

// ── Assets ───────────────────────────────────────────────────────────────────

describe('getAssetTotals', () => {
  it('applies sale proceeds only when the apply flag is set', () => {
    const base = { assets_common: 10000, home_sale_net_proceeds: 200000 };
    expect(getAssetTotals({ ...base, apply_home_proceeds: 'Yes' }).totalEffective).toBe(210000);
    expect(getAssetTotals(base).totalEffective).toBe(10000);
    expect(getAssetTotals({ ...base, apply_home_proceeds: 'no' }).saleProceeds).toBe(0);
  });

  it('deducts upfront modifications only when asked to', () => {
    const base = { assets_common: 20000, mods_upfront_total: 5000 };
    const deducted = getAssetTotals({ ...base, mods_deduct_assets: true });
    expect(deducted.modsUpfrontDeducted).toBe(5000);
    expect(deducted.totalEffective).toBe(15000);
    expect(getAssetTotals({ ...base, mods_deduct_assets: false }).totalEffective).toBe(20000);
  });

  it('adds the reverse-mortgage lump sum and subtracts out-of-pocket fees', () => {
    const assets = getAssetTotals({
      assets_common_total: 5000,
      assets_less_common_total: 2500,
      rm_lump_applied: 30000,
      rm_fees_oop_total: 2000,
    });
    expect(assets.common).toBe(5000);
    expect(assets.detail).toBe(2500);
    expect(assets.totalEffective).toBe(35500);
  });

  it('does not clamp negative totals', () => {
    expect(getAssetTotals({ assets_common: 1000, rm_fees_oop: 5000 }).totalEffective).toBe(-4000);
  });
});

// ── Runway ───────────────────────────────────────────────────────────────────

describe('computeRunway', () => {
  it('floors assets over the monthly gap', () => {
    expect(computeRunway(3000, 10000)).toEqual({ months: 3, years: 0, remainderMonths: 3 });
    expect(computeRunway(1000, 30500)).toEqual({ months: 30, years: 2, remainderMonths: 6 });
  });

  it('is zero without a shortfall', () => {
    expect(computeRunway(0, 50000).months).toBe(0);
    expect(computeRunway(-1000, 50000).months).toBe(0);
  });

  it('is zero without positive assets', () => {
    expect(computeRunway(3000, 0).months).toBe(0);
    expect(computeRunway(3000, -4000).months).toBe(0);
  });

  it('decomposes months into years and remainder', () => {
    for (const [gap, assets] of [
      [250, 9999],
      [1200, 100000],
      [7, 1000],
    ]) {
      const runway = computeRunway(gap, assets);
      expect(runway.months).toBe(Math.floor(assets / gap));
      expect(runway.years * 12 + runway.remainderMonths).toBe(runway.months);
      expect(runway.remainderMonths).toBeLessThan(12);
    }
  });
});

// ── Full picture ─────────────────────────────────────────────────────────────

describe('computeTotals', () => {
  it('computes the gap from costs and income', () => {
    const totals = computeTotals({ care_total: 4000, home_monthly: 800, inc_A: 1800 });
    expect(totals.costs.total).toBe(4800);
    expect(totals.income.total).toBe(1800);
    expect(totals.gap).toBe(3000);
  });

  it('gives a year of runway for 36000 against a 3000 gap', () => {
    const totals = computeTotals({ care_total: 4800, inc_A: 1800, assets_common: 36000 });
    expect(totals.gap).toBe(3000);
    expect(totals.assets.totalEffective).toBe(36000);
    expect(totals.runway).toEqual({ months: 12, years: 1, remainderMonths: 0 });
  });

  it('gives no runway when there are no assets', () => {
    const totals = computeTotals({ care_total: 4800, inc_A: 1800 });
    expect(totals.gap).toBe(3000);
    expect(totals.runway.months).toBe(0);
  });

  it('gives no runway for a surplus however large the assets', () => {
    const totals = computeTotals({ care_total: 1000, inc_A: 2000, assets_common: 500000 });
    expect(totals.gap).toBe(-1000);
    expect(totals.runway).toEqual({ months: 0, years: 0, remainderMonths: 0 });
  });

  it('never throws on malformed values', () => {
    const totals = computeTotals({ care_total: 'lots', inc_A: { nested: 1 }, assets_common: [1, 2] });
    expect(totals.costs.total).toBe(0);
    expect(totals.income.total).toBe(0);
    expect(totals.assets.totalEffective).toBe(0);
    expect(totals.gap).toBe(0);
  });

  it('is idempotent and leaves the snapshot untouched', () => {
    const snapshot = {
      a_ss: '2,000',
      care_total: 5200,
      assets_common: '$48,000',
      apply_sale_to_assets: 'true',
      sale_net: 90000,
    };
    const copy = { ...snapshot };
    const first = computeTotals(snapshot);
    const second = computeTotals(snapshot);
    expect(second).toEqual(first);
    expect(snapshot).toEqual(copy);
    expect(first.assets.totalEffective).toBe(138000);
    expect(first.runway).toEqual({ months: 43, years: 3, remainderMonths: 7 });
  });

  it('returns a frozen result', () => {
    const totals = computeTotals({ care_total: 100 });
    expect(Object.isFrozen(totals)).toBe(true);
    expect(Object.isFrozen(totals.income)).toBe(true);
    expect(Object.isFrozen(totals.runway)).toBe(true);
  });
});
