// src/planner-core/household.ts
// Household panel calculators. Each turns one panel's inputs into the snapshot
// fields the totals engine reads.

import {
  HOUSEHOLD_PANELS,
  type HOME_DECISIONS,
  type MODS_FINISHES,
  type MODS_PAYMENTS,
} from '@shared/constants';
import type { FinancialInputSnapshot } from '@shared/types';
import type { CostTable } from './rule-pack';
import {
  benefitsInputSchema,
  homeDecisionInputSchema,
  homeModsInputSchema,
  validateInput,
} from './inputs';

export type HomeDecision = (typeof HOME_DECISIONS)[number];
export type ModsFinish = (typeof MODS_FINISHES)[number];
export type ModsPayment = (typeof MODS_PAYMENTS)[number];
export type HouseholdPanel = (typeof HOUSEHOLD_PANELS)[number];

export interface HomeDecisionInput {
  decision: HomeDecision;
  mortgage: number;
  heloc: number;
  propertyTax: number;
  insurance: number;
  hoa: number;
  utilities: number;
  salePrice: number;
  payoff: number;
  /** Selling fees as a percent of the sale price; the pack default applies when absent. */
  feePct?: number;
  applyProceeds: boolean;
}

export interface HomeDecisionResult {
  decision: HomeDecision;
  monthlyTotal: number;
  saleFees: number;
  netProceeds: number;
  snapshot: FinancialInputSnapshot;
}

export interface HomeModsInput {
  payment: ModsPayment;
  finish: ModsFinish;
  /** Item key to quantity. */
  items: Record<string, number>;
  months: number;
  deductFromAssets: boolean;
}

export interface HomeModsResult {
  total: number;
  monthlyTotal: number;
  upfrontTotal: number;
  deductFromAssets: boolean;
  snapshot: FinancialInputSnapshot;
}

export interface BenefitsPerson {
  vaTier?: string;
  /** Actual monthly VA payment; overrides the tier cap. */
  vaMonthly?: number;
  hasLtc: boolean;
}

export interface BenefitsInput {
  a: BenefitsPerson;
  b?: BenefitsPerson;
}

export interface BenefitsResult {
  vaA: number;
  vaB: number;
  ltcAddA: number;
  ltcAddB: number;
  total: number;
  hasLtcInsurance: boolean;
  snapshot: FinancialInputSnapshot;
}

export function computeHomeDecision(input: HomeDecisionInput, table: CostTable): HomeDecisionResult {
  const carrying = input.propertyTax + input.insurance + input.hoa + input.utilities;
  let monthlyTotal = 0;
  let saleFees = 0;
  let netProceeds = 0;

  switch (input.decision) {
    case 'keep':
      monthlyTotal = input.mortgage + carrying;
      break;
    case 'heloc':
      monthlyTotal = input.heloc + carrying;
      break;
    case 'reverse_mortgage':
      monthlyTotal = carrying;
      break;
    case 'sell': {
      const feePct = input.feePct ?? table.settings.home_sale_fee_pct;
      saleFees = Math.round((input.salePrice * feePct) / 100);
      netProceeds = Math.max(0, input.salePrice - input.payoff - saleFees);
      break;
    }
  }

  return {
    decision: input.decision,
    monthlyTotal,
    saleFees,
    netProceeds,
    snapshot: {
      home_monthly_total: monthlyTotal,
      home_sale_net_proceeds: input.applyProceeds ? netProceeds : 0,
      apply_home_proceeds: input.applyProceeds,
    },
  };
}

export function computeHomeMods(input: HomeModsInput, table: CostTable): HomeModsResult {
  const { mods_items, mods_finish_multipliers } = table.lookups;
  const multiplier = Object.hasOwn(mods_finish_multipliers, input.finish)
    ? mods_finish_multipliers[input.finish]
    : 1;

  let total = 0;
  for (const [item, quantity] of Object.entries(input.items)) {
    if (!Object.hasOwn(mods_items, item)) continue;
    total += Math.trunc(mods_items[item] * multiplier * quantity);
  }

  const amortized = input.payment === 'amortize';
  const monthlyTotal = amortized ? Math.round(total / Math.max(1, input.months)) : 0;
  const upfrontTotal = amortized ? 0 : total;
  const deductFromAssets = amortized ? false : input.deductFromAssets;

  return {
    total,
    monthlyTotal,
    upfrontTotal,
    deductFromAssets,
    snapshot: {
      mods_monthly_total: monthlyTotal,
      mods_upfront_total: upfrontTotal,
      mods_deduct_assets: deductFromAssets,
    },
  };
}

function vaMonthlyFor(person: BenefitsPerson | undefined, caps: Record<string, number>): number {
  if (!person) return 0;
  if (person.vaMonthly !== undefined) return person.vaMonthly;
  if (person.vaTier !== undefined && Object.hasOwn(caps, person.vaTier)) {
    return caps[person.vaTier];
  }
  return 0;
}

export function computeBenefits(input: BenefitsInput, table: CostTable): BenefitsResult {
  const caps = table.lookups.va_monthly_caps;
  const ltcAdd = table.settings.ltc_monthly_add;

  const vaA = vaMonthlyFor(input.a, caps);
  const vaB = vaMonthlyFor(input.b, caps);
  const ltcAddA = input.a.hasLtc ? ltcAdd : 0;
  const ltcAddB = input.b?.hasLtc ? ltcAdd : 0;
  const hasLtcInsurance = input.a.hasLtc || input.b?.hasLtc === true;

  return {
    vaA,
    vaB,
    ltcAddA,
    ltcAddB,
    total: vaA + vaB + ltcAddA + ltcAddB,
    hasLtcInsurance,
    snapshot: {
      a_va_monthly: vaA,
      b_va_monthly: vaB,
      has_ltc_insurance: hasLtcInsurance,
    },
  };
}

export function findUnknownModItems(input: Pick<HomeModsInput, 'items'>, table: CostTable): string[] {
  return Object.keys(input.items).filter((item) => !Object.hasOwn(table.lookups.mods_items, item));
}

export function findUnknownVaTiers(input: BenefitsInput, table: CostTable): string[] {
  const caps = table.lookups.va_monthly_caps;
  return [input.a, input.b]
    .map((person) => person?.vaTier)
    .filter((tier): tier is string => tier !== undefined && !Object.hasOwn(caps, tier));
}

export function isHouseholdPanel(name: string): name is HouseholdPanel {
  return HOUSEHOLD_PANELS.some((panel) => panel === name);
}

export type PanelResult = HomeDecisionResult | HomeModsResult | BenefitsResult;

/** Validates a panel body against the pack's tables and runs its calculator. */
export function computePanel(
  panel: HouseholdPanel,
  body: unknown,
  table: CostTable,
): { success: true; result: PanelResult } | { success: false; error: string } {
  switch (panel) {
    case 'home-decision': {
      const parsed = validateInput(homeDecisionInputSchema, body);
      if (!parsed.success) return parsed;
      return { success: true, result: computeHomeDecision(parsed.data, table) };
    }
    case 'home-mods': {
      const parsed = validateInput(homeModsInputSchema, body);
      if (!parsed.success) return parsed;
      const unknown = findUnknownModItems(parsed.data, table);
      if (unknown.length > 0) {
        return { success: false, error: `items: unknown item(s): ${unknown.join(', ')}` };
      }
      return { success: true, result: computeHomeMods(parsed.data, table) };
    }
    case 'benefits': {
      const parsed = validateInput(benefitsInputSchema, body);
      if (!parsed.success) return parsed;
      const unknown = findUnknownVaTiers(parsed.data, table);
      if (unknown.length > 0) {
        return { success: false, error: `vaTier: unknown tier(s): ${unknown.join(', ')}` };
      }
      return { success: true, result: computeBenefits(parsed.data, table) };
    }
  }
}
