export const API_PREFIX = '/api';

export const CARE_TYPES = ['in_home', 'assisted_living', 'memory_care'] as const;

export const CARE_TYPE_LABELS = {
  in_home: 'In-Home Care',
  assisted_living: 'Assisted Living',
  memory_care: 'Memory Care',
} as const;

export const FALLBACK_RULE = 'in_home_with_support_fallback';

export const NARRATIVE_PLACEHOLDERS = [
  'greeting',
  'reasons',
  'preference_clause',
  'name',
  'care_type',
] as const;

export const RULE_PACK_FILES = {
  meta: 'pack.json',
  questions: 'questions.json',
  recommendations: 'recommendations.json',
  costs: 'costs.json',
} as const;

// Snapshot field -> accepted keys, highest priority first.
export const FIELD_ALIASES = {
  incA: ['inc_A'],
  aSocialSecurity: ['a_ss', 'ind_a_ss'],
  aPension: ['a_pn', 'ind_a_pn'],
  aOther: ['a_other', 'ind_a_other'],
  incB: ['inc_B'],
  bSocialSecurity: ['b_ss', 'ind_b_ss'],
  bPension: ['b_pn', 'ind_b_pn'],
  bOther: ['b_other', 'ind_b_other'],
  incHouse: ['inc_house'],
  hhRent: ['hh_rent', 'rent_income'],
  hhAnnuity: ['hh_annuity'],
  hhInvest: ['hh_invest', 'hh_investments'],
  hhTrust: ['hh_trust'],
  hhOther: ['hh_other'],
  vaA: ['va_A', 'a_va_monthly'],
  vaB: ['va_B', 'b_va_monthly'],
  rmMonthly: ['rm_monthly', 'rm_monthly_income'],
  careTotal: ['care_total', 'care_monthly_total'],
  homeMonthly: ['home_monthly', 'home_monthly_total'],
  modsMonthly: ['mods_monthly', 'mods_monthly_total'],
  otherMonthly: ['other_monthly', 'other_monthly_total'],
  assetsCommon: ['assets_common', 'assets_common_total'],
  assetsDetail: ['assets_detail', 'assets_detailed_total', 'assets_less_common_total'],
  applySale: [
    'apply_sale_to_assets',
    'apply_home_proceeds',
    'apply_net_proceeds',
    'apply_home_sale_to_assets',
    'apply_sale_net_to_assets',
    'apply_home_sale',
  ],
  saleProceeds: ['sale_proceeds', 'home_sale_net_proceeds', 'sale_net'],
  rmLump: ['rm_lump', 'rm_lump_applied'],
  rmFeesOop: ['rm_fees_oop', 'rm_fees_oop_total'],
  modsUpfront: ['mods_upfront', 'mods_upfront_total'],
  modsDeduct: ['mods_deduct', 'mods_deduct_assets'],
} as const;

export const MOBILITY_LEVELS = ['Independent', 'Assisted', 'Non-ambulatory'] as const;
export const CHRONIC_LEVELS = ['None', 'Some', 'Multiple/Complex'] as const;

export const HOME_DECISIONS = ['keep', 'sell', 'heloc', 'reverse_mortgage'] as const;
export const MODS_FINISHES = ['Budget', 'Standard', 'Custom'] as const;
export const MODS_PAYMENTS = ['amortize', 'upfront'] as const;
export const HOUSEHOLD_PANELS = ['home-decision', 'home-mods', 'benefits'] as const;
