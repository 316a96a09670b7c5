import { createServer } from 'http';
import path from 'path';
import { config } from './config';
import { API_PREFIX } from '@shared/constants';
import { loadRulePack } from '@core/rule-pack';
import { createSeededRandom } from '@core/random';
import { SessionStore } from '@core/session';
import { createApp } from './app';

async function start() {
  const packDir = path.resolve(config.rulePackDir);
  const rulePack = await loadRulePack(packDir);
  console.warn(
    `[RULES] Loaded ${rulePack.meta.packId} (${rulePack.questions.length} questions, ${rulePack.recommendations.decision_precedence.length} ranked rules)`,
  );

  const random =
    config.narrativeSeed === null ? Math.random : createSeededRandom(config.narrativeSeed);
  const sessions = new SessionStore({
    idleTtlMs: config.sessionIdleMinutes * 60 * 1000,
    maxSessions: config.maxSessions,
  });
  const app = createApp({ rulePack, sessions, random });
  const server = createServer(app);

  function shutdown(signal: string) {
    console.warn(`[SERVER] ${signal} received, shutting down`);
    server.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 5000).unref();
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  server.listen(config.port, () => {
    console.warn(`[SERVER] Care planner API on port ${config.port} (${config.nodeEnv})`);
    console.warn(`[SERVER] Health: http://localhost:${config.port}${API_PREFIX}/health`);
  });
}

start().catch((err) => {
  console.error('[SERVER] Failed to start:', err);
  process.exit(1);
});
