import 'dotenv/config';

function optionalInt(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) ? null : value;
}

export const config = {
  port: parseInt(process.env.PORT || '3002', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5174',
  rulePackDir: process.env.RULE_PACK_DIR || 'rule-packs/senior-care-v1',
  narrativeSeed: optionalInt(process.env.NARRATIVE_SEED),
  sessionIdleMinutes: parseInt(process.env.SESSION_IDLE_MINUTES || '120', 10),
  maxSessions: parseInt(process.env.MAX_SESSIONS || '1000', 10),
} as const;
