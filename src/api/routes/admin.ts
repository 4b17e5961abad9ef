import { FastifyInstance } from 'fastify';
import { AppContext } from '../context';
import { IndexRebuildError } from '../../errors';
import { ROUTE_RATE_LIMITS } from '../../config/system/constants';

const NOT_SUPPORTED = { error: 'not_supported' };

export async function registerAdminRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const { indexRebuild, archive } = ctx.store.capabilities;

  app.post('/admin/index/rebuild', { config: { rateLimit: ROUTE_RATE_LIMITS.admin } }, async (req, reply) => {
    if (!indexRebuild) {
      return reply.status(501).send(NOT_SUPPORTED);
    }
    try {
      const mode = await indexRebuild.rebuildIndex();
      return reply.send({ status: 'rebuilt', mode });
    } catch (err) {
      if (err instanceof IndexRebuildError) {
        req.log.error({ err }, 'index rebuild failed');
        return reply.status(500).send({ error: 'rebuild_failed', message: err.message });
      }
      throw err;
    }
  });

  app.post('/admin/archive', { config: { rateLimit: ROUTE_RATE_LIMITS.admin } }, async (_req, reply) => {
    if (!archive) {
      return reply.status(501).send(NOT_SUPPORTED);
    }
    return reply.send(await archive.archiveNow());
  });

  app.get('/archive/months', async (_req, reply) => {
    if (!archive) {
      return reply.status(501).send(NOT_SUPPORTED);
    }
    return reply.send({ months: await archive.listMonths() });
  });
}
