import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppContext } from '../context';
import { pageQuerySchema, sessionParamsSchema } from './search';
import { buildItemView, buildListPage, clampIndex, pageNumbers } from '../../services/presenter';
import { SEARCH_RULES } from '../../config/search/validationRules';
import { SOURCE_LOOKUP } from '../../config/search/constants';
import { SourceCount } from '../../types';

const startSchema = z.object({
  source: z.string().trim().min(1).max(SEARCH_RULES.sourceMaxLength),
  n: z.coerce.number().int().default(1)
});

const itemParamsSchema = sessionParamsSchema.extend({
  idx: z.coerce.number().int()
});

const STALE_SOURCE = {
  error: 'stale_session',
  message: 'Source session expired. Open the source again.'
};

type SourceMatch =
  | { kind: 'exact'; source: string }
  | { kind: 'none' }
  | { kind: 'ambiguous'; candidates: string[] };

export function resolveSource(name: string, stats: SourceCount[]): SourceMatch {
  const wanted = name.toLowerCase();
  const exact = stats.find((s) => s.source.toLowerCase() === wanted);
  if (exact) return { kind: 'exact', source: exact.source };

  const candidates = stats.filter((s) => s.source.toLowerCase().includes(wanted)).map((s) => s.source);
  if (candidates.length === 0) return { kind: 'none' };
  if (candidates.length === 1) return { kind: 'exact', source: candidates[0] };
  return { kind: 'ambiguous', candidates };
}

export async function registerSourceRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.get('/sources', async () => ({ sources: await ctx.store.countBySource() }));

  app.post('/source', async (req, reply) => {
    const parsed = startSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const match = resolveSource(parsed.data.source, await ctx.store.countBySource());
    if (match.kind === 'none') {
      return reply.status(404).send({ error: 'source_not_found' });
    }
    if (match.kind === 'ambiguous') {
      return reply.status(409).send({
        error: 'ambiguous_source',
        candidates: match.candidates.slice(0, SOURCE_LOOKUP.maxCandidates),
        truncated: match.candidates.length > SOURCE_LOOKUP.maxCandidates
      });
    }

    const source = match.source;
    const total = await ctx.store.totalBySource(source);
    if (total === 0) {
      return reply.status(404).send({ error: 'no_items', source });
    }

    const key = ctx.sourceSessions.put(source);
    const index = clampIndex(parsed.data.n - 1, total);
    const [item] = await ctx.store.sourcePage(source, 1, index);
    if (!item) {
      return reply.status(404).send({ error: 'no_items', source });
    }
    return reply.send({ key, source, ...buildItemView(item, index, total, source) });
  });

  app.get('/source/:key', async (req, reply) => {
    const params = sessionParamsSchema.safeParse(req.params);
    const paging = pageQuerySchema.safeParse(req.query);
    if (!params.success || !paging.success) {
      return reply.status(400).send({ error: 'invalid_page_request' });
    }

    const source = ctx.sourceSessions.get(params.data.key);
    if (source === undefined) {
      return reply.status(410).send(STALE_SOURCE);
    }

    const { offset } = paging.data;
    const limit = paging.data.limit ?? ctx.paging.pageSize;
    const total = await ctx.store.totalBySource(source);
    const rows = await ctx.store.sourcePage(source, limit, offset);
    const { page, totalPages } = pageNumbers(offset, limit, total);
    const header = `Source: [${source}] (page ${page}/${totalPages}, total ${total})`;
    return reply.send({ key: params.data.key, source, ...buildListPage({ rows, offset, limit, total, header }) });
  });

  app.get('/source/:key/items/:idx', async (req, reply) => {
    const params = itemParamsSchema.safeParse(req.params);
    if (!params.success) {
      return reply.status(400).send({ error: params.error.flatten() });
    }

    const source = ctx.sourceSessions.get(params.data.key);
    if (source === undefined) {
      return reply.status(410).send(STALE_SOURCE);
    }

    const total = await ctx.store.totalBySource(source);
    if (total === 0) {
      return reply.status(404).send({ error: 'no_items', source });
    }
    const index = clampIndex(params.data.idx, total);
    const [item] = await ctx.store.sourcePage(source, 1, index);
    if (!item) {
      return reply.status(404).send({ error: 'no_items', source });
    }
    return reply.send({ key: params.data.key, source, ...buildItemView(item, index, total, source) });
  });
}
