// src/planner-core/cost-calculator.ts
// Flat lookup estimate of a monthly care bill, plus panel defaults seeded from
// a recommendation.

import type { CHRONIC_LEVELS, MOBILITY_LEVELS } from '@shared/constants';
import type { CareType } from '@shared/types';
import type { CostTable } from './rule-pack';
import type { RecommendationResult } from './recommendation';

export type MobilityLevel = (typeof MOBILITY_LEVELS)[number];
export type ChronicLevel = (typeof CHRONIC_LEVELS)[number];

export interface CostInput {
  careType: CareType;
  state: string;
  careLevel: string;
  mobility: string;
  chronic: string;
  roomType?: string;
  inHomeHoursPerDay: number;
}

// Care level is left to the user.
export interface CostDefaults {
  mobility: MobilityLevel;
  chronic: ChronicLevel;
}

const DEFAULT_ROOM_TYPE = 'Studio';
const DEFAULT_ROOM_PRICE = 4200;
const DEFAULT_HOURLY_RATE = 42;

function lookup(table: Record<string, number>, key: string, fallback: number): number {
  return Object.hasOwn(table, key) ? table[key] : fallback;
}

export function estimateMonthlyCost(input: CostInput, table: CostTable): number {
  const { settings, lookups } = table;
  const stateMultiplier = lookup(lookups.state_multipliers, input.state, 1);
  const careAdd = lookup(lookups.care_level_adders, input.careLevel, 0);
  const chronicAdd = lookup(lookups.chronic_adders, input.chronic, 0);

  if (input.careType === 'in_home') {
    const mobilityAdd = lookup(lookups.mobility_adders.in_home, input.mobility, 0);
    const hours = Math.trunc(input.inHomeHoursPerDay);
    const rate = lookup(lookups.in_home_care_matrix, String(hours), DEFAULT_HOURLY_RATE);
    const subtotal = hours * rate * settings.days_per_month + careAdd + mobilityAdd + chronicAdd;
    return Math.round(subtotal * stateMultiplier);
  }

  const mobilityAdd = lookup(lookups.mobility_adders.facility, input.mobility, 0);
  let base = lookup(lookups.room_type, input.roomType ?? DEFAULT_ROOM_TYPE, DEFAULT_ROOM_PRICE);
  if (input.careType === 'memory_care') {
    base = Math.round(base * settings.memory_care_multiplier);
  }
  return Math.round((base + careAdd + mobilityAdd + chronicAdd) * stateMultiplier);
}

/** Starting values for the cost panel, before the user adjusts anything. */
export function deriveCostDefaults(result: Pick<RecommendationResult, 'flags'>): CostDefaults {
  const flags = new Set(result.flags);

  let mobility: MobilityLevel = 'Independent';
  if (flags.has('high_mobility_dependence')) mobility = 'Non-ambulatory';
  else if (flags.has('moderate_mobility')) mobility = 'Assisted';

  let chronic: ChronicLevel = 'None';
  if (flags.has('complex_condition')) chronic = 'Multiple/Complex';
  else if (flags.has('parkinsons') || flags.has('diabetes')) chronic = 'Some';

  return { mobility, chronic };
}
