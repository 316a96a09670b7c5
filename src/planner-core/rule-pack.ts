import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { CARE_TYPES, FALLBACK_RULE, RULE_PACK_FILES } from '@shared/constants';
import { ConfigurationError } from './errors';
import { isKnownPlaceholder, placeholdersIn } from './narrative';

// --- Schemas ---

export const packMetaSchema = z.object({
  packId: z.string().min(1),
  name: z.string(),
  version: z.string(),
  effectiveDate: z.string(),
  description: z.string().optional(),
});

const answerTriggerSchema = z.object({
  answer: z.union([z.string(), z.number(), z.boolean()]),
  flag: z.string().min(1),
  reason: z.string().optional(),
});

const questionSchema = z.object({
  id: z.string().min(1).optional(),
  question: z.string(),
  answers: z.record(z.string(), z.string()).optional(),
  trigger: z.record(z.string(), z.array(answerTriggerSchema)).default({}),
});

export const questionsFileSchema = z.object({
  questions: z.array(questionSchema),
});

const recommendationRuleSchema = z.object({
  criteria: z.string(),
  message_template: z.string().optional(),
  outcome: z.enum(CARE_TYPES).optional(),
});

export const recommendationRulesSchema = z.object({
  decision_precedence: z.array(z.string()),
  final_recommendation: z.record(z.string(), recommendationRuleSchema),
  greeting_templates: z.array(z.string()).default([]),
  preference_clause_templates: z
    .object({ default: z.array(z.string()).min(1) })
    .catchall(z.array(z.string())),
  scoring: z.record(z.string(), z.record(z.string(), z.number())),
});

const lookupSchema = z.record(z.string(), z.number()).default({});

export const costTableSchema = z.object({
  settings: z
    .object({
      days_per_month: z.number().positive().default(30),
      memory_care_multiplier: z.number().positive().default(1.25),
      home_sale_fee_pct: z.number().min(0).max(100).default(6),
      ltc_monthly_add: z.number().nonnegative().default(1800),
    })
    .default({}),
  lookups: z
    .object({
      state_multipliers: lookupSchema,
      care_level_adders: lookupSchema,
      mobility_adders: z
        .object({ in_home: lookupSchema, facility: lookupSchema })
        .default({}),
      chronic_adders: lookupSchema,
      room_type: lookupSchema,
      in_home_care_matrix: lookupSchema,
      va_monthly_caps: lookupSchema,
      mods_items: lookupSchema,
      mods_finish_multipliers: lookupSchema,
    })
    .default({}),
});

// --- Types ---

export type PackMeta = z.infer<typeof packMetaSchema>;
export type AnswerTrigger = z.infer<typeof answerTriggerSchema>;
export type QuestionDefinition = z.infer<typeof questionSchema> & { id: string };
export type RecommendationRule = z.infer<typeof recommendationRuleSchema>;
export type RecommendationRules = z.infer<typeof recommendationRulesSchema>;
export type CostTable = z.infer<typeof costTableSchema>;

export interface RulePack {
  meta: PackMeta;
  questions: QuestionDefinition[];
  recommendations: RecommendationRules;
  costs: CostTable;
  flagIndex: Set<string>;
}

// --- Consistency checks ---

export interface CategoryAlignmentResult {
  valid: boolean;
  missing: string[];
  extra: string[];
  error?: string;
}

/**
 * Trigger categories used by the questions must be exactly the categories the
 * in-home and assisted-living scoring tables weigh.
 */
export function checkCategoryAlignment(
  questions: QuestionDefinition[],
  rules: Pick<RecommendationRules, 'scoring'>,
): CategoryAlignmentResult {
  const questionCategories = new Set(questions.flatMap((q) => Object.keys(q.trigger)));
  const scoringCategories = new Set([
    ...Object.keys(rules.scoring.in_home ?? {}),
    ...Object.keys(rules.scoring.assisted_living ?? {}),
  ]);

  const missing = [...questionCategories].filter((c) => !scoringCategories.has(c)).sort();
  const extra = [...scoringCategories].filter((c) => !questionCategories.has(c)).sort();

  if (missing.length > 0 || extra.length > 0) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing in scoring: ${missing.join(', ')}`);
    if (extra.length > 0) parts.push(`extra in scoring: ${extra.join(', ')}`);
    return { valid: false, missing, extra, error: `Category mismatch (${parts.join('; ')})` };
  }

  return { valid: true, missing, extra };
}

/** Problems that would make `recommend` fail or silently misbehave. */
export function findRuleTableProblems(rules: RecommendationRules): string[] {
  const problems: string[] = [];
  const table = rules.final_recommendation;

  for (const name of rules.decision_precedence) {
    const rule = table[name];
    if (!rule) {
      problems.push(`decision_precedence names unknown rule '${name}'`);
      continue;
    }
    if (!rule.message_template) {
      problems.push(`rule '${name}' has no message_template`);
    }
    // Ranked rules resolve their care type from criteria and flags.
    if (rule.outcome !== undefined && name !== FALLBACK_RULE) {
      problems.push(`rule '${name}' sets an outcome, which only the fallback rule reads`);
    }
  }

  const fallback = table[FALLBACK_RULE];
  if (!fallback) {
    problems.push(`fallback rule '${FALLBACK_RULE}' is missing`);
  } else if (!fallback.message_template) {
    problems.push(`fallback rule '${FALLBACK_RULE}' has no message_template`);
  }

  for (const [name, rule] of Object.entries(table)) {
    const unknown = placeholdersIn(rule.message_template ?? '').filter(
      (p) => !isKnownPlaceholder(p),
    );
    if (unknown.length > 0) {
      problems.push(`rule '${name}' uses unknown placeholders: ${unknown.join(', ')}`);
    }
  }

  return problems;
}

// --- Loader ---

async function readJson(filePath: string): Promise<unknown> {
  const raw = await readFile(filePath, 'utf-8');
  return JSON.parse(raw);
}

function parseFile<S extends z.ZodTypeAny>(schema: S, data: unknown, file: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(result.error.message, file);
  }
  return result.data;
}

export function normalizeQuestions(
  questions: z.infer<typeof questionsFileSchema>['questions'],
): QuestionDefinition[] {
  const seen = new Set<string>();
  return questions.map((q, index) => {
    const id = q.id ?? `q${index + 1}`;
    if (seen.has(id)) {
      throw new ConfigurationError(`Duplicate question id '${id}'`, RULE_PACK_FILES.questions);
    }
    seen.add(id);
    return { ...q, id };
  });
}

export async function loadRulePack(packDir: string): Promise<RulePack> {
  const [metaRaw, questionsRaw, recommendationsRaw, costsRaw] = await Promise.all([
    readJson(path.join(packDir, RULE_PACK_FILES.meta)),
    readJson(path.join(packDir, RULE_PACK_FILES.questions)),
    readJson(path.join(packDir, RULE_PACK_FILES.recommendations)),
    readJson(path.join(packDir, RULE_PACK_FILES.costs)),
  ]);

  const meta = parseFile(packMetaSchema, metaRaw, RULE_PACK_FILES.meta);
  const questions = normalizeQuestions(
    parseFile(questionsFileSchema, questionsRaw, RULE_PACK_FILES.questions).questions,
  );
  const recommendations = parseFile(
    recommendationRulesSchema,
    recommendationsRaw,
    RULE_PACK_FILES.recommendations,
  );
  const costs = parseFile(costTableSchema, costsRaw, RULE_PACK_FILES.costs);

  const problems = findRuleTableProblems(recommendations);
  if (problems.length > 0) {
    throw new ConfigurationError(problems.join('; '), RULE_PACK_FILES.recommendations);
  }

  const alignment = checkCategoryAlignment(questions, recommendations);
  if (!alignment.valid) {
    throw new ConfigurationError(
      alignment.error ?? 'Category mismatch',
      `${RULE_PACK_FILES.questions} + ${RULE_PACK_FILES.recommendations}`,
    );
  }

  const flagIndex = new Set(
    questions.flatMap((q) => Object.values(q.trigger).flatMap((rules) => rules.map((r) => r.flag))),
  );

  return { meta, questions, recommendations, costs, flagIndex };
}
