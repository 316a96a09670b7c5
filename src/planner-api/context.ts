import type { RulePack } from '@core/rule-pack';
import type { RandomSource } from '@core/random';
import type { SessionStore } from '@core/session';

/** Everything a request handler may read. Built once at startup. */
export interface PlannerContext {
  rulePack: RulePack;
  sessions: SessionStore;
  random: RandomSource;
}
