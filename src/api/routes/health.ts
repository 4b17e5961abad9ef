import { FastifyInstance } from 'fastify';
import { AppContext } from '../context';

export async function registerHealthRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  app.get('/health', async () => {
    const db = (await ctx.store.ping()) ? 'ok' : 'error';
    return {
      status: db === 'ok' ? 'ok' : 'degraded',
      services: {
        api: 'ok',
        db,
        fullTextIndex: ctx.store.fullTextIndex() ? 'ok' : 'unavailable'
      }
    };
  });

  app.get('/ready', async () => ({ status: 'ready' }));
}
