// src/planner-core/recommendation.ts
// Care-type recommendation from guided-question answers.
// Pure function: (answers, questions, rules, random) -> result.

import { CARE_TYPE_LABELS, FALLBACK_RULE } from '@shared/constants';
import type { AnswerScalar, AnswerSet, AnswerValue, CareType } from '@shared/types';
import { ConfigurationError } from './errors';
import { fillTemplate } from './narrative';
import { pick, type RandomSource } from './random';
import type { QuestionDefinition, RecommendationRule, RecommendationRules } from './rule-pack';

// ── Types ────────────────────────────────────────────────────────────────────

export interface ScoreMap {
  in_home: number;
  assisted_living: number;
  memory_care: number;
}

export interface RecommendationResult {
  readonly careType: CareType;
  readonly ruleName: string;
  readonly flags: readonly string[];
  readonly scores: Readonly<ScoreMap>;
  readonly reasons: readonly string[];
  readonly narrative: string;
}

export interface DerivedFlags {
  flags: Set<string>;
  reasons: string[];
}

export interface RuleSelection {
  careType: CareType;
  ruleName: string;
  rule: RecommendationRule;
}

// ── Constants ────────────────────────────────────────────────────────────────

export const MOBILITY_REASON = 'Relies on a wheelchair to get around';
export const MEMORY_REASON = 'Shows signs of memory decline';
export const NO_REASONS_PHRASE = 'no major care concerns were flagged';
export const DEFAULT_GREETING = 'Hello';
export const RECIPIENT_NAME = 'your loved one';

/** Free-text triggers applied to every answer regardless of pack contents. */
export const TEXT_TRIGGERS = [
  { needle: 'wheelchair', flag: 'high_mobility_dependence', reason: MOBILITY_REASON },
  { needle: 'memory', flag: 'moderate_cognitive_decline', reason: MEMORY_REASON },
] as const;

// ── Flags ────────────────────────────────────────────────────────────────────

function answerParts(value: AnswerValue): AnswerScalar[] {
  return Array.isArray(value) ? value : [value];
}

/**
 * Flags and reason strings for the answered questions. Questions without an
 * answer contribute nothing; reasons are recorded once each, in the order the
 * questions are defined.
 */
export function deriveFlags(answers: AnswerSet, questions: QuestionDefinition[]): DerivedFlags {
  const flags = new Set<string>();
  const reasons: string[] = [];

  const raise = (flag: string, reason?: string) => {
    flags.add(flag);
    if (reason && !reasons.includes(reason)) reasons.push(reason);
  };

  for (const question of questions) {
    if (!Object.hasOwn(answers, question.id)) continue;
    const parts = answerParts(answers[question.id]);

    for (const part of parts) {
      if (typeof part !== 'string') continue;
      const text = part.toLowerCase();
      for (const trigger of TEXT_TRIGGERS) {
        if (text.includes(trigger.needle)) raise(trigger.flag, trigger.reason);
      }
    }

    for (const triggers of Object.values(question.trigger)) {
      for (const trigger of triggers) {
        const matched = parts.some((p) => p !== null && String(p) === String(trigger.answer));
        if (matched) raise(trigger.flag, trigger.reason);
      }
    }
  }

  return { flags, reasons };
}

export function scoreFlags(flags: ReadonlySet<string>): ScoreMap {
  const all = [...flags];
  return {
    in_home: all.filter((f) => f.includes('mobility')).length,
    assisted_living: all.length,
    memory_care: flags.has('moderate_cognitive_decline') ? 1 : 0,
  };
}

// ── Rule walk ────────────────────────────────────────────────────────────────

// Matched as written, case included.
const MEMORY_CARE_CRITERIA = 'memory care';
const ASSISTED_LIVING_CRITERIA = 'assisted living';

/**
 * First rule in precedence order that applies. Names without an entry in the
 * table are skipped; with no match the fallback rule decides.
 */
export function selectRule(
  flags: ReadonlySet<string>,
  scores: ScoreMap,
  rules: RecommendationRules,
): RuleSelection {
  const table = rules.final_recommendation;

  for (const ruleName of rules.decision_precedence) {
    if (!Object.hasOwn(table, ruleName)) continue;
    const rule = table[ruleName];

    if (flags.has('severe_cognitive_risk') || rule.criteria.includes(MEMORY_CARE_CRITERIA)) {
      return { careType: 'memory_care', ruleName, rule };
    }
    if (rule.criteria.includes(ASSISTED_LIVING_CRITERIA) && scores.assisted_living >= 2) {
      return { careType: 'assisted_living', ruleName, rule };
    }
  }

  if (!Object.hasOwn(table, FALLBACK_RULE)) {
    throw new ConfigurationError(`Fallback rule '${FALLBACK_RULE}' is missing`);
  }
  const fallback = table[FALLBACK_RULE];
  return { careType: fallback.outcome ?? 'in_home', ruleName: FALLBACK_RULE, rule: fallback };
}

// ── Main computation ─────────────────────────────────────────────────────────

export function recommend(
  answers: AnswerSet,
  questions: QuestionDefinition[],
  rules: RecommendationRules,
  random: RandomSource = Math.random,
): RecommendationResult {
  const { flags, reasons } = deriveFlags(answers, questions);
  const scores = scoreFlags(flags);
  const { careType, ruleName, rule } = selectRule(flags, scores, rules);

  if (!rule.message_template) {
    throw new ConfigurationError(`Rule '${ruleName}' has no message_template`);
  }

  const greeting = pick(rules.greeting_templates, random) ?? DEFAULT_GREETING;
  const preferenceClause = pick(rules.preference_clause_templates.default, random) ?? '';

  const narrative = fillTemplate(rule.message_template, {
    greeting,
    reasons: reasons.length > 0 ? reasons.join('; ') : NO_REASONS_PHRASE,
    preference_clause: preferenceClause,
    name: RECIPIENT_NAME,
    care_type: CARE_TYPE_LABELS[careType],
  });

  return Object.freeze({
    careType,
    ruleName,
    flags: Object.freeze([...flags]),
    scores: Object.freeze(scores),
    reasons: Object.freeze([...reasons]),
    narrative,
  });
}
