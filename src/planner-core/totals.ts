// src/planner-core/totals.ts
// Household affordability picture: income, costs, effective assets, runway.
// Pure function: (snapshot) -> totals. No side effects.

import { FIELD_ALIASES } from '@shared/constants';
import type { FinancialInputSnapshot, SnapshotField } from '@shared/types';
import { pickAlias, toBool, toInt } from './coercion';

// ── Result shape ─────────────────────────────────────────────────────────────

export interface IncomeTotals {
  incA: number;
  incB: number;
  incHouse: number;
  vaA: number;
  vaB: number;
  rmMonthly: number;
  total: number;
}

export interface CostTotals {
  careTotal: number;
  homeMonthly: number;
  modsMonthly: number;
  otherMonthly: number;
  total: number;
}

export interface AssetTotals {
  common: number;
  detail: number;
  saleProceeds: number;
  rmLump: number;
  rmFeesOop: number;
  modsUpfrontDeducted: number;
  totalEffective: number;
}

export interface Runway {
  months: number;
  years: number;
  remainderMonths: number;
}

export interface TotalsResult {
  readonly income: Readonly<IncomeTotals>;
  readonly costs: Readonly<CostTotals>;
  readonly assets: Readonly<AssetTotals>;
  readonly gap: number;
  readonly runway: Readonly<Runway>;
}

// ── Field readers ────────────────────────────────────────────────────────────

function readInt(snapshot: FinancialInputSnapshot, field: SnapshotField): number {
  return toInt(pickAlias(snapshot, FIELD_ALIASES[field]));
}

function readFlag(snapshot: FinancialInputSnapshot, field: SnapshotField): boolean {
  return toBool(pickAlias(snapshot, FIELD_ALIASES[field], false));
}

/** Pre-aggregated figure when non-zero, otherwise the sum of its parts. */
function aggregateOrParts(
  snapshot: FinancialInputSnapshot,
  aggregate: SnapshotField,
  parts: SnapshotField[],
): number {
  const total = readInt(snapshot, aggregate);
  if (total) return total;
  return parts.reduce((sum, field) => sum + readInt(snapshot, field), 0);
}

// ── Sections ─────────────────────────────────────────────────────────────────

export function getIncomeTotals(snapshot: FinancialInputSnapshot): IncomeTotals {
  const incA = aggregateOrParts(snapshot, 'incA', ['aSocialSecurity', 'aPension', 'aOther']);
  const incB = aggregateOrParts(snapshot, 'incB', ['bSocialSecurity', 'bPension', 'bOther']);
  const incHouse = aggregateOrParts(snapshot, 'incHouse', [
    'hhRent',
    'hhAnnuity',
    'hhInvest',
    'hhTrust',
    'hhOther',
  ]);
  const vaA = readInt(snapshot, 'vaA');
  const vaB = readInt(snapshot, 'vaB');
  const rmMonthly = readInt(snapshot, 'rmMonthly');

  return {
    incA,
    incB,
    incHouse,
    vaA,
    vaB,
    rmMonthly,
    total: incA + incB + incHouse + vaA + vaB + rmMonthly,
  };
}

export function getCostTotals(snapshot: FinancialInputSnapshot): CostTotals {
  const careTotal = readInt(snapshot, 'careTotal');
  const homeMonthly = readInt(snapshot, 'homeMonthly');
  const modsMonthly = readInt(snapshot, 'modsMonthly');
  const otherMonthly = readInt(snapshot, 'otherMonthly');

  return {
    careTotal,
    homeMonthly,
    modsMonthly,
    otherMonthly,
    total: careTotal + homeMonthly + modsMonthly + otherMonthly,
  };
}

export function getAssetTotals(snapshot: FinancialInputSnapshot): AssetTotals {
  const common = readInt(snapshot, 'assetsCommon');
  const detail = readInt(snapshot, 'assetsDetail');
  const saleProceeds = readFlag(snapshot, 'applySale') ? readInt(snapshot, 'saleProceeds') : 0;
  const rmLump = readInt(snapshot, 'rmLump');
  const rmFeesOop = readInt(snapshot, 'rmFeesOop');
  const modsUpfrontDeducted = readFlag(snapshot, 'modsDeduct')
    ? readInt(snapshot, 'modsUpfront')
    : 0;

  return {
    common,
    detail,
    saleProceeds,
    rmLump,
    rmFeesOop,
    modsUpfrontDeducted,
    // Negative totals are kept as-is; the runway guard treats them as no assets.
    totalEffective: common + detail + saleProceeds + rmLump - rmFeesOop - modsUpfrontDeducted,
  };
}

/**
 * Whole months the assets cover a monthly shortfall. Zero whenever there is no
 * shortfall or nothing to draw on.
 */
export function computeRunway(gap: number, assetsEffective: number): Runway {
  const months = gap > 0 && assetsEffective > 0 ? Math.floor(assetsEffective / gap) : 0;
  return {
    months,
    years: Math.floor(months / 12),
    remainderMonths: months % 12,
  };
}

// ── Main computation ─────────────────────────────────────────────────────────

export function computeTotals(snapshot: FinancialInputSnapshot): TotalsResult {
  const income = getIncomeTotals(snapshot);
  const costs = getCostTotals(snapshot);
  const assets = getAssetTotals(snapshot);
  const gap = costs.total - income.total;

  return Object.freeze({
    income: Object.freeze(income),
    costs: Object.freeze(costs),
    assets: Object.freeze(assets),
    gap,
    runway: Object.freeze(computeRunway(gap, assets.totalEffective)),
  });
}
