import { FastifyReply, FastifyRequest } from 'fastify';

const OPEN_PREFIXES = ['/health', '/ready'];

export function apiKeyGuard(apiKey: string | undefined) {
  return async function guard(req: FastifyRequest, reply: FastifyReply) {
    if (!apiKey) return;
    if (OPEN_PREFIXES.some((prefix) => req.url.startsWith(prefix))) return;

    const headerKey = req.headers['x-api-key'];
    if (headerKey !== apiKey) {
      return reply.status(401).send({ error: 'unauthorized' });
    }
  };
}
