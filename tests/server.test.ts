import { createHash } from 'crypto';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { FastifyInstance } from 'fastify';
import { buildServer, ServerOptions } from '../src/api/index';
import { IndexRebuildError } from '../src/errors';
import { seededStore } from './helpers/fixtures';

const paging = { pageSize: 10, searchPageSize: 10, latestCount: 10 };
const key8 = (payload: string) => createHash('sha1').update(payload).digest('hex').slice(0, 8);

describe('server routes', () => {
  let app: FastifyInstance | undefined;

  async function start(options: ServerOptions = {}): Promise<FastifyInstance> {
    app = await buildServer({ store: await seededStore(), paging, ...options });
    return app;
  }

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('health works', async () => {
    const server = await start();
    const res = await server.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', services: { api: 'ok', db: 'ok', fullTextIndex: 'ok' } });
  });

  it('stats reports totals and index availability', async () => {
    const server = await start({ store: await seededStore({ withIndex: false }) });
    const res = await server.inject({ method: 'GET', url: '/stats' });
    expect(res.json()).toEqual({
      total: 5,
      sources: [
        { source: 'Meduza', count: 2 },
        { source: 'Reuters', count: 2 },
        { source: 'BBC', count: 1 }
      ],
      index: 'unavailable',
      sessions: { search: 0, source: 0 }
    });
  });

  describe('search', () => {
    it('validates input', async () => {
      const server = await start();
      const res = await server.inject({ method: 'POST', url: '/filter', payload: { q: '' } });
      expect(res.statusCode).toBe(400);
    });

    it('rejects queries with no searchable term', async () => {
      const server = await start();
      for (const q of ['   ', 'AND OR']) {
        const res = await server.inject({ method: 'POST', url: '/filter', payload: { q } });
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({ error: 'empty_query' });
      }
    });

    it('starts a session and renders the first page', async () => {
      const server = await start();
      const res = await server.inject({ method: 'POST', url: '/filter', payload: { q: 'F-16' } });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({ key: key8('f-16'), query: 'F-16', path: 'index', total: 1, offset: 0, limit: 10 });
      expect(body.text).toBe(
        'Search: “F-16”\nResults 1–1 of 1 (page 1/1)\n\n' +
          '1. [Reuters] <b>F-16</b> jets delivered\n2025-08-03T10:00:00.000Z\nThe first <b>F-16</b> squadron arrives.'
      );
    });

    it('pages through a stored session', async () => {
      const server = await start();
      const first = await server.inject({ method: 'POST', url: '/filter', payload: { q: 'кризис', limit: 1 } });
      const body = first.json();
      expect(body.total).toBe(2);
      expect(body.items[0].link).toBe('https://news.example/2');
      expect(body.navigation.next).toEqual({ offset: 1, limit: 1 });

      const next = await server.inject({ method: 'GET', url: `/filter/${body.key}?offset=1&limit=1` });
      expect(next.statusCode).toBe(200);
      expect(next.json().items).toEqual([
        { position: 2, link: 'https://news.example/1', line: expect.stringContaining('2. [Meduza]') }
      ]);
    });

    it('honors a trailing page selector', async () => {
      const server = await start();
      const res = await server.inject({ method: 'POST', url: '/filter', payload: { q: 'кризис |2', limit: 1 } });
      const body = res.json();
      expect(body).toMatchObject({ key: key8('кризис'), query: 'кризис', offset: 1 });
      expect(body.items[0].position).toBe(2);
    });

    it('answers 410 for an unknown session', async () => {
      const server = await start();
      const res = await server.inject({ method: 'GET', url: '/filter/ffffffff' });
      expect(res.statusCode).toBe(410);
      expect(res.json().error).toBe('stale_session');
    });
  });

  describe('sources', () => {
    it('opens a source case-insensitively at its newest item', async () => {
      const server = await start();
      const res = await server.inject({ method: 'POST', url: '/source', payload: { source: 'meduza' } });
      expect(res.statusCode).toBe(200);
      const body = res.json();
      expect(body).toMatchObject({ key: key8('meduza'), source: 'Meduza', index: 0, total: 2, link: 'https://news.example/2' });
      expect(body.text).toBe(
        'Source: [Meduza] — item 1 of 2\n\nМировой кризис и рынки\n\n2025-08-02T10:00:00.000Z\n\nБиржи падают третий день.'
      );
    });

    it('resolves a unique partial name', async () => {
      const server = await start();
      const res = await server.inject({ method: 'POST', url: '/source', payload: { source: 'bb' } });
      expect(res.json().source).toBe('BBC');
    });

    it('lists candidates for an ambiguous name', async () => {
      const server = await start();
      const res = await server.inject({ method: 'POST', url: '/source', payload: { source: 'e' } });
      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({ error: 'ambiguous_source', candidates: ['Meduza', 'Reuters'], truncated: false });
    });

    it('answers 404 for an unknown source', async () => {
      const server = await start();
      const res = await server.inject({ method: 'POST', url: '/source', payload: { source: 'xyz' } });
      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: 'source_not_found' });
    });

    it('pages and steps through a source session', async () => {
      const server = await start();
      const opened = await server.inject({ method: 'POST', url: '/source', payload: { source: 'Meduza' } });
      const { key } = opened.json();

      const list = await server.inject({ method: 'GET', url: `/source/${key}?limit=1` });
      expect(list.json().text).toBe(
        'Source: [Meduza] (page 1/2, total 2)\nItems 1–1 of 2\n\n1. [Meduza] Мировой кризис и рынки\n2025-08-02T10:00:00.000Z'
      );

      const item = await server.inject({ method: 'GET', url: `/source/${key}/items/5` });
      expect(item.json()).toMatchObject({ index: 1, link: 'https://news.example/1' });
    });

    it('answers 410 for an unknown source session', async () => {
      const server = await start();
      const res = await server.inject({ method: 'GET', url: '/source/ffffffff/items/0' });
      expect(res.statusCode).toBe(410);
    });
  });

  describe('news', () => {
    it('lists the latest items', async () => {
      const server = await start();
      const body = (await server.inject({ method: 'GET', url: '/latest' })).json();
      expect(body.total).toBe(5);
      expect(body.items.map((i: { link: string }) => i.link)).toEqual([
        'https://news.example/5',
        'https://news.example/4',
        'https://news.example/3',
        'https://news.example/2',
        'https://news.example/1'
      ]);
      expect(body.text.startsWith('Latest 10 items\nItems 1–5 of 5')).toBe(true);
    });

    it('clamps item positions into range', async () => {
      const server = await start();
      const body = (await server.inject({ method: 'GET', url: '/news/99' })).json();
      expect(body).toMatchObject({ index: 4, total: 5, link: 'https://news.example/1' });
    });
  });

  it('ingests items and skips duplicates', async () => {
    const server = await start();
    const payload = {
      items: [{ source: 'BBC', title: 'Markets calm', link: 'https://news.example/6', published: '2025-08-06T10:00:00Z' }]
    };
    const first = await server.inject({ method: 'POST', url: '/ingest', payload });
    expect(first.statusCode).toBe(201);
    expect(first.json()).toEqual({ received: 1, inserted: 1, duplicates: 0 });

    const again = await server.inject({ method: 'POST', url: '/ingest', payload });
    expect(again.json()).toEqual({ received: 1, inserted: 0, duplicates: 1 });
  });

  describe('admin', () => {
    it('answers 501 when the store lacks a capability', async () => {
      const server = await start();
      expect((await server.inject({ method: 'POST', url: '/admin/index/rebuild' })).statusCode).toBe(501);
      expect((await server.inject({ method: 'POST', url: '/admin/archive' })).statusCode).toBe(501);
      expect((await server.inject({ method: 'GET', url: '/archive/months' })).json()).toEqual({ error: 'not_supported' });
    });

    it('reports the rebuild mode', async () => {
      const rebuildIndex = vi.fn().mockResolvedValue('full');
      const server = await start({ store: await seededStore({ capabilities: { indexRebuild: { rebuildIndex } } }) });
      const res = await server.inject({ method: 'POST', url: '/admin/index/rebuild' });
      expect(res.json()).toEqual({ status: 'rebuilt', mode: 'full' });
      expect(rebuildIndex).toHaveBeenCalledTimes(1);
    });

    it('maps a failed rebuild to 500', async () => {
      const rebuildIndex = vi.fn().mockRejectedValue(new IndexRebuildError('full-text index is not available'));
      const server = await start({ store: await seededStore({ capabilities: { indexRebuild: { rebuildIndex } } }) });
      const res = await server.inject({ method: 'POST', url: '/admin/index/rebuild' });
      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({ error: 'rebuild_failed', message: 'full-text index is not available' });
    });

    it('archives and lists months', async () => {
      const archive = {
        archiveNow: vi.fn().mockResolvedValue({ moved: 3, bySource: { BBC: 1, Meduza: 2 } }),
        listMonths: vi.fn().mockResolvedValue(['2025-07', '2025-06'])
      };
      const server = await start({ store: await seededStore({ capabilities: { archive } }) });
      expect((await server.inject({ method: 'POST', url: '/admin/archive' })).json()).toEqual({
        moved: 3,
        bySource: { BBC: 1, Meduza: 2 }
      });
      expect((await server.inject({ method: 'GET', url: '/archive/months' })).json()).toEqual({
        months: ['2025-07', '2025-06']
      });
    });
  });

  describe('api key', () => {
    it('guards every route except health checks', async () => {
      const server = await start({ apiKey: 'test-secret' });
      expect((await server.inject({ method: 'GET', url: '/health' })).statusCode).toBe(200);

      const denied = await server.inject({ method: 'GET', url: '/stats' });
      expect(denied.statusCode).toBe(401);
      expect(denied.json()).toEqual({ error: 'unauthorized' });

      const allowed = await server.inject({ method: 'GET', url: '/stats', headers: { 'x-api-key': 'test-secret' } });
      expect(allowed.statusCode).toBe(200);
    });
  });
});
