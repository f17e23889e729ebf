import express from 'express';
import cors from 'cors';
import { InMemoryOutbox } from './channels/outbox.js';
import { getCoordinatorConfig, getEnv, getReplyToUrl, getWorkerEndpoints, type Env } from './env.js';
import { getFirestore } from './firebase.js';
import { Coordinator } from './orchestrator/coordinator.js';
import { createFirestoreTurnArchive } from './repositories/turnRepository.js';
import { createRepliesRouter } from './routes/replies.js';
import { createSessionsRouter } from './routes/sessions.js';
import { createHttpWorkerDirectory } from './workers/directory.js';

export interface Services {
  coordinator: Coordinator;
  outbox: InMemoryOutbox;
}

export function createServices(env: Env = getEnv()): Services {
  const outbox = new InMemoryOutbox();
  const coordinator = new Coordinator({
    config: getCoordinatorConfig(env),
    directory: createHttpWorkerDirectory({ endpoints: getWorkerEndpoints(env), replyTo: getReplyToUrl(env) }),
    channel: outbox,
    archive: env.TURN_ARCHIVE_ENABLED ? createFirestoreTurnArchive() : undefined
  });
  return { coordinator, outbox };
}

export function createApp(services?: Services) {
  const env = getEnv();
  const { coordinator, outbox } = services ?? createServices(env);

  const normalizeOrigin = (value: string) => value.trim().replace(/\/+$/, '');
  const allowedOrigins = (env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',') : [])
    .map((o) => o.trim())
    .filter(Boolean)
    .map(normalizeOrigin);

  const app = express();
  app.use(express.json({ limit: '2mb' }));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Workers and health checks may omit Origin.
        if (!origin) return callback(null, true);

        if (allowedOrigins.length === 0) return callback(null, true);

        const normalized = normalizeOrigin(origin);
        return callback(null, allowedOrigins.includes(normalized));
      }
    })
  );

  app.get('/health', (_req, res) => res.json({ ok: true, sessions: coordinator.sessionCount }));

  app.get('/health/firestore', async (_req, res) => {
    try {
      const db = getFirestore();
      // Read-only check: attempt to read a non-existent doc.
      await db.doc('_health/ping').get();
      return res.json({ ok: true });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Unknown error';
      return res.status(500).json({ ok: false, error: 'FIRESTORE_UNAVAILABLE', message });
    }
  });

  app.use(createSessionsRouter({ coordinator, outbox }));
  app.use(createRepliesRouter({ coordinator }));

  return app;
}
