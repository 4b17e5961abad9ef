import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AppContext } from '../context';
import { pageQuerySchema } from './search';
import { buildItemView, buildListPage, clampIndex } from '../../services/presenter';

const itemParamsSchema = z.object({
  n: z.coerce.number().int()
});

export async function registerNewsRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.get('/latest', async (req, reply) => {
    const parsed = pageQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const { offset } = parsed.data;
    const limit = parsed.data.limit ?? ctx.paging.latestCount;
    const [rows, total] = await Promise.all([ctx.store.latestPage(offset, limit), ctx.store.total()]);
    const header = offset === 0 ? `Latest ${limit} items` : 'News';
    return reply.send(buildListPage({ rows, offset, limit, total, header }));
  });

  // Position is 1-based and clamped into range.
  app.get('/news/:n', async (req, reply) => {
    const parsed = itemParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.status(400).send({ error: parsed.error.flatten() });
    }

    const total = await ctx.store.total();
    if (total === 0) {
      return reply.status(404).send({ error: 'no_items' });
    }
    const index = clampIndex(parsed.data.n - 1, total);
    const [item] = await ctx.store.latestPage(index, 1);
    if (!item) {
      return reply.status(404).send({ error: 'no_items' });
    }
    return reply.send(buildItemView(item, index, total));
  });
}
