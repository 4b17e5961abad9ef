import fastify from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { config } from '../config/env';
import { RATE_LIMIT_ALLOWLIST } from '../config/system/constants';
import { PgNewsStore } from '../db/newsRepository';
import { SearchEngine } from '../services/searchService';
import { SessionStore } from '../services/sessionStore';
import { NewsStore } from '../types/store';
import { AppContext, PagingSettings } from './context';
import { apiKeyGuard } from './hooks/auth';
import { registerHealthRoutes } from './routes/health';
import { registerStatsRoutes } from './routes/stats';
import { registerNewsRoutes } from './routes/news';
import { registerSearchRoutes } from './routes/search';
import { registerSourceRoutes } from './routes/sources';
import { registerIngestRoutes } from './routes/ingest';
import { registerAdminRoutes } from './routes/admin';

export interface ServerOptions {
  store?: NewsStore;
  searchSessions?: SessionStore;
  sourceSessions?: SessionStore;
  paging?: Partial<PagingSettings>;
  apiKey?: string;
}

export async function buildServer(options: ServerOptions = {}) {
  const app = fastify({
    logger: {
      level: config.LOG_LEVEL,
      transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
      redact: ['req.headers.authorization', 'req.headers["x-api-key"]']
    }
  });

  let store = options.store;
  if (!store) {
    const pgStore = new PgNewsStore({
      tsConfig: config.SEARCH_TS_CONFIG,
      archiveAfterDays: config.ARCHIVE_AFTER_DAYS,
      log: app.log
    });
    await pgStore.init();
    store = pgStore;
  }

  const sessionLimits = { maxEntries: config.SESSION_MAX_ENTRIES, ttlMs: config.SESSION_TTL_MS, log: app.log };
  const ctx: AppContext = {
    store,
    engine: new SearchEngine(store, app.log),
    searchSessions: options.searchSessions ?? new SessionStore({ ...sessionLimits, name: 'search' }),
    sourceSessions: options.sourceSessions ?? new SessionStore({ ...sessionLimits, name: 'source' }),
    paging: {
      pageSize: config.PAGE_SIZE,
      searchPageSize: config.searchPageSize,
      latestCount: config.latestCount,
      ...options.paging
    }
  };

  await app.register(helmet, { contentSecurityPolicy: false });

  await app.register(cors, {
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true
  });

  await app.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: config.RATE_LIMIT_WINDOW,
    allowList: RATE_LIMIT_ALLOWLIST
  });

  app.addHook('onRequest', apiKeyGuard(options.apiKey ?? config.API_KEY));

  const sweep = setInterval(() => {
    const removed = ctx.searchSessions.sweep() + ctx.sourceSessions.sweep();
    if (removed > 0) app.log.debug({ removed }, 'expired sessions swept');
  }, Math.min(config.SESSION_TTL_MS, 10 * 60 * 1000));
  sweep.unref();
  app.addHook('onClose', async () => {
    clearInterval(sweep);
  });

  await registerHealthRoutes(app, ctx);
  await registerStatsRoutes(app, ctx);
  await registerNewsRoutes(app, ctx);
  await registerSearchRoutes(app, ctx);
  await registerSourceRoutes(app, ctx);
  await registerIngestRoutes(app, ctx);
  await registerAdminRoutes(app, ctx);

  return app;
}

if (process.env.NODE_ENV !== 'test') {
  buildServer()
    .then((app) =>
      app.listen({ port: config.PORT, host: '0.0.0.0' }).then(() => {
        app.log.info(`news search API running on ${config.PORT}`);
      })
    )
    .catch((err) => {
      // eslint-disable-next-line no-console
      console.error('Failed to start server', err);
      process.exit(1);
    });
}
