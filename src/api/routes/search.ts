import { FastifyBaseLogger, FastifyInstance } from 'fastify';
import { performance } from 'node:perf_hooks';
import { z } from 'zod';
import { AppContext } from '../context';
import { parseQuery } from '../../search/parser';
import { extractPatterns } from '../../search/highlight';
import { buildSearchPage, splitPageSuffix } from '../../services/presenter';
import { SEARCH_RULES } from '../../config/search/validationRules';
import { ROUTE_RATE_LIMITS } from '../../config/system/constants';

const startSchema = z.object({
  q: z.string().min(SEARCH_RULES.queryMinLength).max(SEARCH_RULES.queryMaxLength),
  page: z.number().int().positive().optional(),
  limit: z.number().int().positive().max(SEARCH_RULES.limitMax).optional()
});

export const sessionParamsSchema = z.object({
  key: z.string().min(1).max(64)
});

export const pageQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().positive().max(SEARCH_RULES.limitMax).optional()
});

export const STALE_SEARCH = {
  error: 'stale_session',
  message: 'Search session expired. Run the search again.'
};

async function renderSearchPage(
  ctx: AppContext,
  log: FastifyBaseLogger,
  key: string,
  query: string,
  offset: number,
  limit: number
) {
  const started = performance.now();
  const { rows, total, path } = await ctx.engine.search(query, limit, offset);
  log.info({ key, total, path, durationMs: Math.round(performance.now() - started) }, 'search executed');

  const view = buildSearchPage({
    rows,
    offset,
    limit,
    total,
    header: `Search: “${query}”`,
    patterns: extractPatterns(query)
  });
  return { key, query, path, offset, limit, ...view };
}

export async function registerSearchRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.post('/filter', { config: { rateLimit: ROUTE_RATE_LIMITS.search } }, async (req, reply) => {
    const parsed = startSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const payload = parsed.data;
    const { query, page } = payload.page ? { query: payload.q, page: payload.page } : splitPageSuffix(payload.q);
    if (!query.trim() || !parseQuery(query)) {
      return reply.status(400).send({ error: 'empty_query' });
    }

    const key = ctx.searchSessions.put(query);
    const limit = payload.limit ?? ctx.paging.searchPageSize;
    return reply.send(await renderSearchPage(ctx, req.log, key, query, (page - 1) * limit, limit));
  });

  app.get('/filter/:key', { config: { rateLimit: ROUTE_RATE_LIMITS.search } }, async (req, reply) => {
    const params = sessionParamsSchema.safeParse(req.params);
    const paging = pageQuerySchema.safeParse(req.query);
    if (!params.success || !paging.success) {
      return reply.status(400).send({ error: 'invalid_page_request' });
    }

    const query = ctx.searchSessions.get(params.data.key);
    if (query === undefined) {
      return reply.status(410).send(STALE_SEARCH);
    }

    const limit = paging.data.limit ?? ctx.paging.searchPageSize;
    return reply.send(await renderSearchPage(ctx, req.log, params.data.key, query, paging.data.offset, limit));
  });
}
