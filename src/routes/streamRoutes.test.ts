import http from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createApp } from '../app';
import { StreamManager } from '../streamManager';
import { FakeRunner } from '../testing/fakeRunner';

const URLS = { publicHost: 'samples', rtspPort: 8554, hlsBaseUrl: 'http://samples:8888' };

describe('stream routes', () => {
  let runner: FakeRunner;
  let manager: StreamManager;
  let server: http.Server;
  let baseUrl: string;

  const post = (route: string, init: RequestInit = {}) => fetch(`${baseUrl}${route}`, { method: 'POST', ...init });

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    runner = new FakeRunner();
    manager = new StreamManager({ runner });
    await manager.upsert('/videos/sailboat.mp4');
    await manager.upsert('/videos/harbor.mp4');

    server = http.createServer(createApp(manager, { urls: URLS, requestLogging: false }));
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    baseUrl = address && typeof address === 'object' ? `http://127.0.0.1:${address.port}` : '';
  });

  afterEach(async () => {
    await new Promise(resolve => {
      server.close(resolve);
      server.closeAllConnections();
    });
    await manager.shutdown();
    vi.restoreAllMocks();
  });

  describe('GET /api/streams', () => {
    it('should list every stream with its public urls', async () => {
      const res = await fetch(`${baseUrl}/api/streams`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        success: true,
        count: 2,
        data: [
          {
            id: 'harbor',
            sourcePath: '/videos/harbor.mp4',
            status: 'stopped',
            loopCount: -1,
            rtspUrl: 'rtsp://samples:8554/harbor',
            hlsUrl: 'http://samples:8888/harbor/index.m3u8',
          },
          {
            id: 'sailboat',
            sourcePath: '/videos/sailboat.mp4',
            status: 'stopped',
            loopCount: -1,
            rtspUrl: 'rtsp://samples:8554/sailboat',
            hlsUrl: 'http://samples:8888/sailboat/index.m3u8',
          },
        ],
      });
    });

    it('should return one stream by id', async () => {
      const res = await fetch(`${baseUrl}/api/streams/sailboat`);
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ success: true, data: { id: 'sailboat', status: 'stopped' } });
    });

    it('should answer 404 for an unknown id', async () => {
      const res = await fetch(`${baseUrl}/api/streams/nope`);
      const body = await res.json();

      expect(res.status).toBe(404);
      expect(body).toEqual({
        success: false,
        message: 'Stream not found: nope',
        error: { kind: 'NotFound', streamId: 'nope' },
      });
    });
  });

  describe('POST /api/streams/:id/start', () => {
    it('should start the stream with the loop count from the query string', async () => {
      const res = await post('/api/streams/sailboat/start?loop=0');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toMatchObject({ data: { id: 'sailboat', status: 'running', loopCount: 0, pid: runner.started[0].pid } });
    });

    it('should be idempotent', async () => {
      const first = await (await post('/api/streams/sailboat/start')).json();
      const second = await (await post('/api/streams/sailboat/start?loop=3')).json();

      expect(second).toEqual(first);
      expect(runner.started).toHaveLength(1);
    });

    it('should accept the loop count from a JSON body', async () => {
      const res = await post('/api/streams/sailboat/start', {
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ loop: 2 }),
      });

      expect(await res.json()).toMatchObject({ data: { loopCount: 2 } });
    });

    it('should accept the loop count from a form body', async () => {
      const res = await post('/api/streams/sailboat/start', {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: 'loop=3',
      });

      expect(await res.json()).toMatchObject({ data: { loopCount: 3 } });
    });

    it.each(['abc', '-2', '1.5'])('should reject loop=%s', async (loop) => {
      const res = await post(`/api/streams/sailboat/start?loop=${loop}`);
      const body = await res.json();

      expect(res.status).toBe(400);
      expect(body).toEqual({
        success: false,
        message: `Invalid loop count "${loop}": expected an integer >= -1`,
        error: { kind: 'InvalidRequest' },
      });
      expect(runner.started).toHaveLength(0);
    });

    it('should answer 404 for an unknown id', async () => {
      const res = await post('/api/streams/nope/start');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({ error: { kind: 'NotFound', streamId: 'nope' } });
    });

    it('should surface a spawn failure', async () => {
      runner.failingIds.add('sailboat');

      const res = await post('/api/streams/sailboat/start');
      const body = await res.json();

      expect(res.status).toBe(500);
      expect(body).toMatchObject({ success: false, error: { kind: 'ProcessSpawnFailure', streamId: 'sailboat' } });
      expect(manager.get('sailboat').status).toBe('stopped');
    });
  });

  describe('POST /api/streams/:id/stop', () => {
    it('should stop a running stream and stay stopped on repeat', async () => {
      await post('/api/streams/sailboat/start');

      const first = await post('/api/streams/sailboat/stop');
      const second = await post('/api/streams/sailboat/stop');

      expect(first.status).toBe(200);
      expect(await first.json()).toMatchObject({ data: { status: 'stopped' } });
      expect(second.status).toBe(200);
      expect(await second.json()).toMatchObject({ data: { status: 'stopped' } });
      expect(runner.live()).toHaveLength(0);
    });

    it('should answer 404 for an unknown id', async () => {
      const res = await post('/api/streams/nope/stop');

      expect(res.status).toBe(404);
    });
  });

  describe('bulk routes', () => {
    it('should start all streams and report partial failures', async () => {
      runner.failingIds.add('harbor');

      const res = await post('/api/streams/start-all');
      const body = await res.json();

      expect(res.status).toBe(207);
      expect(body).toEqual({
        success: false,
        count: 2,
        data: [
          {
            id: 'harbor',
            success: false,
            error: { kind: 'ProcessSpawnFailure', message: 'Failed to launch encoder for harbor: spawn ENOENT' },
          },
          { id: 'sailboat', success: true, status: 'running' },
        ],
      });
    });

    it('should stop all streams', async () => {
      await post('/api/streams/start-all?loop=1');

      const res = await post('/api/streams/stop-all');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body).toEqual({
        success: true,
        count: 2,
        data: [
          { id: 'harbor', success: true, status: 'stopped' },
          { id: 'sailboat', success: true, status: 'stopped' },
        ],
      });
      expect(runner.started.map(child => child.loopCount)).toEqual([1, 1]);
      expect(runner.live()).toHaveLength(0);
    });
  });

  describe('misc', () => {
    it('should report health', async () => {
      await post('/api/streams/sailboat/start');

      const body = await (await fetch(`${baseUrl}/api/health`)).json();

      expect(body).toEqual({ success: true, data: { status: 'ok', streams: 2, running: 1 } });
    });

    it('should serve the control page', async () => {
      const res = await fetch(`${baseUrl}/`);

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toContain('text/html');
      expect(await res.text()).toContain('<title>Stream Control</title>');
    });

    it('should answer JSON 404 for unknown routes', async () => {
      const res = await fetch(`${baseUrl}/api/unknown`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ success: false, message: 'Not found' });
    });

    it('should reject malformed JSON bodies', async () => {
      const res = await post('/api/streams/sailboat/start', {
        headers: { 'Content-Type': 'application/json' },
        body: '{"loop":',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ success: false, error: { kind: 'InvalidRequest' } });
    });
  });
});
