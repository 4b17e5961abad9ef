import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppContext } from '../context';
import { SEARCH_RULES } from '../../config/search/validationRules';
import { ROUTE_RATE_LIMITS } from '../../config/system/constants';

const itemSchema = z.object({
  source: z.string().trim().min(1).max(SEARCH_RULES.sourceMaxLength),
  title: z.string().trim().min(1),
  link: z.string().url(),
  published: z.coerce.date().nullish(),
  summary: z.string().nullish(),
  hash: z.string().min(1).max(128).optional()
});

const ingestSchema = z.object({
  items: z.array(itemSchema).min(1).max(SEARCH_RULES.ingestBatchMax)
});

export async function registerIngestRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.post('/ingest', { config: { rateLimit: ROUTE_RATE_LIMITS.ingest } }, async (req, reply) => {
    const parsed = ingestSchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const items = parsed.data.items.map((item) => ({
      ...item,
      published: item.published ? item.published.toISOString() : null
    }));
    const inserted = await ctx.store.insertMany(items);
    req.log.info({ received: items.length, inserted }, 'ingest finished');

    return reply.status(201).send({ received: items.length, inserted, duplicates: items.length - inserted });
  });
}
