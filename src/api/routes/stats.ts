import { FastifyInstance } from 'fastify';
import { AppContext } from '../context';

export async function registerStatsRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.get('/stats', async (_req, reply) => {
    const [total, sources] = await Promise.all([ctx.store.total(), ctx.store.countBySource()]);
    return reply.send({
      total,
      sources,
      index: ctx.store.fullTextIndex() ? 'available' : 'unavailable',
      sessions: { search: ctx.searchSessions.size, source: ctx.sourceSessions.size }
    });
  });
}
