import { z } from 'zod';
import { CARE_TYPES, HOME_DECISIONS, MODS_FINISHES, MODS_PAYMENTS } from '@shared/constants';

const answerScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const answerSetSchema = z.record(
  z.string(),
  z.union([answerScalarSchema, z.array(answerScalarSchema)]),
);

// Values stay loose here; the totals engine coerces them.
export const snapshotSchema = z.record(z.string(), z.unknown());

export const costInputSchema = z.object({
  careType: z.enum(CARE_TYPES),
  state: z.string().default('National'),
  careLevel: z.string().default('Medium'),
  mobility: z.string().default('Independent'),
  chronic: z.string().default('Some'),
  roomType: z.string().optional(),
  inHomeHoursPerDay: z.number().int().min(0).max(24).default(4),
});

const dollars = z.number().int().nonnegative().default(0);

export const homeDecisionInputSchema = z.object({
  decision: z.enum(HOME_DECISIONS),
  mortgage: dollars,
  heloc: dollars,
  propertyTax: dollars,
  insurance: dollars,
  hoa: dollars,
  utilities: dollars,
  salePrice: dollars,
  payoff: dollars,
  feePct: z.number().min(4).max(8).optional(),
  applyProceeds: z.boolean().default(true),
});

export const homeModsInputSchema = z.object({
  payment: z.enum(MODS_PAYMENTS).default('amortize'),
  finish: z.enum(MODS_FINISHES).default('Standard'),
  items: z.record(z.string(), z.number().int().min(1)).default({}),
  months: z.number().int().min(6).max(60).default(12),
  deductFromAssets: z.boolean().default(true),
});

const benefitsPersonSchema = z.object({
  vaTier: z.string().optional(),
  vaMonthly: z.number().int().nonnegative().optional(),
  hasLtc: z.boolean().default(false),
});

export const benefitsInputSchema = z.object({
  a: benefitsPersonSchema.default({}),
  b: benefitsPersonSchema.optional(),
});

export const recommendRequestSchema = z.object({ answers: answerSetSchema });
export const totalsRequestSchema = z.object({ snapshot: snapshotSchema });

export type CostInputBody = z.infer<typeof costInputSchema>;

export function validateInput<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
): { success: true; data: z.infer<S> } | { success: false; error: string } {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { success: false, error: `${where}${issue?.message ?? 'Invalid input'}` };
  }
  return { success: true, data: result.data };
}
