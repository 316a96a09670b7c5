import { randomUUID } from 'crypto';
import type { AnswerSet, FinancialInputSnapshot, SessionRecord } from '@shared/types';
import type { RecommendationResult } from './recommendation';

// ---------------------------------------------------------------------------
// Planning session: the explicit context the engines are fed from
// ---------------------------------------------------------------------------

export interface PlanningSession {
  readonly id: string;
  readonly answers: Readonly<AnswerSet>;
  readonly snapshot: Readonly<FinancialInputSnapshot>;
  readonly recommendation: RecommendationResult | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export function toSessionRecord(session: PlanningSession): SessionRecord {
  return {
    id: session.id,
    answers: { ...session.answers },
    snapshot: { ...session.snapshot },
    careType: session.recommendation?.careType ?? null,
    createdAt: session.createdAt.toISOString(),
    updatedAt: session.updatedAt.toISOString(),
  };
}

export interface SessionStoreOptions {
  now?: () => Date;
  newId?: () => string;
  /** Sessions not written for this long are dropped. */
  idleTtlMs?: number;
  /** Creating past this count evicts the least recently written session. */
  maxSessions?: number;
}

export const DEFAULT_IDLE_TTL_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_MAX_SESSIONS = 1000;

/**
 * In-memory sessions for the life of the process. Every write replaces the
 * stored session object, so a session handed out earlier never changes under
 * its holder.
 */
export class SessionStore {
  private readonly sessions = new Map<string, PlanningSession>();
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly idleTtlMs: number;
  private readonly maxSessions: number;

  constructor(options: SessionStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
    this.maxSessions = Math.max(1, options.maxSessions ?? DEFAULT_MAX_SESSIONS);
  }

  /** Stored sessions, idle ones not yet swept included. */
  get size(): number {
    return this.sessions.size;
  }

  create(): PlanningSession {
    const at = this.now();
    this.sweep(at);
    // Map order is write order, so the first key is the stalest session.
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }

    const session: PlanningSession = {
      id: this.newId(),
      answers: {},
      snapshot: {},
      recommendation: null,
      createdAt: at,
      updatedAt: at,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  get(id: string): PlanningSession | undefined {
    return this.live(id, this.now());
  }

  /** Replaces the answer set; a previous recommendation no longer applies. */
  setAnswers(id: string, answers: AnswerSet): PlanningSession | undefined {
    return this.update(id, () => ({ answers: { ...answers }, recommendation: null }));
  }

  /** Overwrites the named snapshot fields, keeping the rest. */
  mergePanel(id: string, values: FinancialInputSnapshot): PlanningSession | undefined {
    return this.update(id, (s) => ({ snapshot: { ...s.snapshot, ...values } }));
  }

  recordRecommendation(id: string, result: RecommendationResult): PlanningSession | undefined {
    return this.update(id, () => ({ recommendation: result }));
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  private isIdle(session: PlanningSession, at: Date): boolean {
    return at.getTime() - session.updatedAt.getTime() >= this.idleTtlMs;
  }

  private live(id: string, at: Date): PlanningSession | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;
    if (this.isIdle(session, at)) {
      this.sessions.delete(id);
      return undefined;
    }
    return session;
  }

  private sweep(at: Date): void {
    for (const [id, session] of this.sessions) {
      if (this.isIdle(session, at)) this.sessions.delete(id);
    }
  }

  private update(
    id: string,
    change: (current: PlanningSession) => Partial<Omit<PlanningSession, 'id' | 'createdAt'>>,
  ): PlanningSession | undefined {
    const at = this.now();
    const current = this.live(id, at);
    if (!current) return undefined;
    const next: PlanningSession = { ...current, ...change(current), updatedAt: at };
    this.sessions.delete(id);
    this.sessions.set(id, next);
    return next;
  }
}
