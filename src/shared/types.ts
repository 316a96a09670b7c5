import type { CARE_TYPES, FIELD_ALIASES } from './constants';

export type CareType = (typeof CARE_TYPES)[number];
export type SnapshotField = keyof typeof FIELD_ALIASES;

export type AnswerScalar = string | number | boolean | null;
export type AnswerValue = AnswerScalar | AnswerScalar[];
export type AnswerSet = Record<string, AnswerValue>;

export type FinancialInputSnapshot = Record<string, unknown>;

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

export interface SessionRecord {
  id: string;
  answers: AnswerSet;
  snapshot: FinancialInputSnapshot;
  careType: CareType | null;
  createdAt: string;
  updatedAt: string;
}
