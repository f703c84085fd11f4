import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import http from 'node:http';
import { WebSocket, type RawData } from 'ws';
import { test } from './testHarness';
import { HttpService } from '../src/adapters/http/httpService';
import { readJsonBody, sendJson } from '../src/adapters/http/utils/jsonBody';
import { isRecord } from '../src/shared/utils/guards';
import { createPlayerHarness, type PlayerHarness, type PlayerHarnessOptions } from './fakes/playerHarness';

type Api = {
  h: PlayerHarness;
  url: (path: string) => string;
  wsUrl: (path: string) => string;
};

async function withApi(options: PlayerHarnessOptions, fn: (api: Api) => Promise<void>): Promise<void> {
  const h = await createPlayerHarness(options);
  const service = new HttpService({ port: 0, host: '127.0.0.1' }, { player: h.player, configPort: h.config });
  await service.start();
  const address = service.address();
  assert.ok(address);
  try {
    await fn({
      h,
      url: (path) => `http://127.0.0.1:${address.port}${path}`,
      wsUrl: (path) => `ws://127.0.0.1:${address.port}${path}`,
    });
  } finally {
    await service.stop();
    await h.cleanup();
  }
}

function record(value: unknown): Record<string, unknown> {
  assert.ok(isRecord(value), `expected an object, got ${JSON.stringify(value)}`);
  return value;
}

async function call(
  url: string,
  method: string,
  body?: unknown,
): Promise<{ status: number; body: Record<string, unknown> }> {
  const res = await fetch(url, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const parsed: unknown = await res.json();
  return { status: res.status, body: record(parsed) };
}

test('play, seek and stop over the API', async () => {
  await withApi({}, async ({ h, url }) => {
    await h.addMedia('a.mp4');
    const played = await call(url('/api/play'), 'POST', { file: 'a.mp4' });
    assert.equal(played.status, 200);
    assert.equal(played.body.success, true);
    assert.equal(record(played.body.status).state, 'playing');

    const seeked = await call(url('/api/seek'), 'POST', { position: 30 });
    assert.equal(seeked.status, 200);
    assert.equal(record(seeked.body.status).position, 30);

    const status = await call(url('/api/status'), 'GET');
    assert.equal(status.body.currentFile, 'a.mp4');

    const stopped = await call(url('/api/stop'), 'POST');
    assert.equal(record(stopped.body.status).state, 'idle');
  });
});

test('API maps player errors to status codes', async () => {
  await withApi({}, async ({ url }) => {
    const missing = await call(url('/api/seek'), 'POST', {});
    assert.equal(missing.status, 400);
    assert.deepEqual(missing.body, {
      success: false,
      error: 'validation-error',
      message: "Missing 'position' parameter",
    });

    const loud = await call(url('/api/volume'), 'POST', { level: 200 });
    assert.equal(loud.status, 400);
    assert.equal(loud.body.message, 'Volume must be between 0 and 150, got 200');

    const idle = await call(url('/api/pause'), 'POST');
    assert.equal(idle.status, 409);
    assert.equal(idle.body.error, 'no-active-session');

    const notFound = await call(url('/api/play'), 'POST', { file: 'nope.mp4' });
    assert.equal(notFound.status, 404);
    assert.equal(notFound.body.error, 'media-not-found');

    const resumeIdle = await call(url('/api/play'), 'POST');
    assert.equal(resumeIdle.status, 409);

    const output = await call(url('/api/hdmi'), 'POST', { output: 'HDMI-A-2' });
    assert.equal(output.status, 200);
    assert.equal(record(output.body.status).outputRoute, 'HDMI-A-2');
  });
});

test('API rejects bad bodies, unknown routes and wrong methods', async () => {
  await withApi({}, async ({ url }) => {
    const invalid = await fetch(url('/api/seek'), { method: 'POST', body: '{"position":' });
    assert.equal(invalid.status, 400);
    assert.equal(record(await invalid.json()).error, 'invalid-json');

    const array = await call(url('/api/seek'), 'POST', [30]);
    assert.equal(array.status, 400);
    assert.equal(array.body.message, 'Request body must be a JSON object');

    const unknown = await call(url('/api/rewind'), 'POST');
    assert.equal(unknown.status, 404);
    assert.equal(unknown.body.error, 'not-found');

    const wrongMethod = await call(url('/api/status'), 'POST');
    assert.equal(wrongMethod.status, 405);

    const outside = await call(url('/elsewhere'), 'GET');
    assert.equal(outside.status, 404);

    const index = await call(url('/'), 'GET');
    assert.equal(index.body.events, '/api/events');

    const preflight = await fetch(url('/api/play'), { method: 'OPTIONS' });
    assert.equal(preflight.status, 204);
    assert.equal(preflight.headers.get('access-control-allow-origin'), '*');
  });
});

test('files can be uploaded, listed and deleted', async () => {
  await withApi({}, async ({ h, url }) => {
    const upload = await fetch(url('/api/files/movie%20one.mp4'), {
      method: 'PUT',
      body: Buffer.from('0123456789'),
    });
    assert.equal(upload.status, 201);
    const uploaded = record(record(await upload.json()).file);
    assert.equal(uploaded.name, 'movie one.mp4');
    assert.equal(uploaded.size, 10);

    const listed = await call(url('/api/files'), 'GET');
    assert.ok(Array.isArray(listed.body.files));
    assert.deepEqual(
      listed.body.files.map((file: unknown) => record(file).name),
      ['movie one.mp4'],
    );

    const traversal = await fetch(url('/api/files/..%2Fescape.mp4'), { method: 'PUT', body: 'x' });
    assert.equal(traversal.status, 400);
    assert.equal(record(await traversal.json()).error, 'invalid-filename');

    const removed = await call(url('/api/files/movie%20one.mp4'), 'DELETE');
    assert.equal(removed.status, 200);
    const again = await call(url('/api/files/movie%20one.mp4'), 'DELETE');
    assert.equal(again.status, 404);
    assert.deepEqual(await h.player.listMedia(), []);
  });
});

test('oversized uploads are refused with 413', async () => {
  await withApi({ maxUploadSize: 8 }, async ({ h, url }) => {
    const res = await fetch(url('/api/files/big.mp4'), { method: 'PUT', body: Buffer.alloc(9) });
    assert.equal(res.status, 413);
    assert.equal(record(await res.json()).error, 'payload-too-large');
    assert.equal(h.transfers.activeCount(), 0);
  });
});

async function until(predicate: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await predicate())) {
    if (Date.now() > deadline) {
      throw new Error('condition not reached in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

test('an upload dropped by the client is discarded', async () => {
  await withApi({}, async ({ h, url }) => {
    const target = new URL(url('/api/files/partial.mp4'));
    const req = http.request({
      host: target.hostname,
      port: target.port,
      path: target.pathname,
      method: 'PUT',
      headers: { 'Content-Length': 100000 },
    });
    req.on('error', () => undefined);
    req.write(Buffer.alloc(4096));
    await until(() => h.transfers.isTransferring('partial.mp4'));

    const health = await call(url('/api/health'), 'GET');
    assert.equal(health.body.activeTransfers, 1);
    assert.ok(Array.isArray(health.body.transfers));
    const [job] = health.body.transfers.map((entry: unknown) => record(entry));
    assert.equal(job?.name, 'partial.mp4');
    assert.equal(job?.declaredSize, 100000);

    req.destroy();
    await until(async () => (await fs.readdir(h.transfers.tempDir)).length === 0);
    await until(() => !h.transfers.isTransferring('partial.mp4'));
    assert.deepEqual(await h.player.listMedia(), []);

    const retry = await fetch(url('/api/files/partial.mp4'), { method: 'PUT', body: Buffer.from('abc') });
    assert.equal(retry.status, 201);
    assert.equal(record(record(await retry.json()).file).size, 3);
  });
});

test('config, health and logs endpoints', async () => {
  await withApi({}, async ({ h, url }) => {
    const config = await call(url('/api/config'), 'GET');
    assert.equal(config.body.port, 5000);

    const updated = await call(url('/api/config'), 'POST', { volume: 90, loop: true });
    assert.equal(updated.status, 200);
    assert.equal(record(updated.body.config).volume, 90);
    assert.equal(h.config.getConfig().loop, true);

    const rejected = await call(url('/api/config'), 'POST', { port: 0 });
    assert.equal(rejected.status, 400);
    assert.equal(h.config.getConfig().port, 5000);

    const health = await call(url('/api/health'), 'GET');
    assert.equal(health.body.status, 'healthy');
    assert.equal(health.body.playerRunning, false);
    assert.equal(health.body.activeTransfers, 0);
    assert.deepEqual(health.body.transfers, []);

    const logs = await call(url('/api/logs?tail=5'), 'GET');
    assert.equal(typeof logs.body.log, 'string');
    assert.ok(Number(logs.body.lines) <= 5);
  });
});

function nextMessage(socket: WebSocket, predicate: (status: Record<string, unknown>) => boolean): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      socket.off('message', onMessage);
      reject(new Error('no matching status message'));
    }, 2000);
    const onMessage = (data: RawData) => {
      const bytes = Array.isArray(data) ? Buffer.concat(data) : Buffer.isBuffer(data) ? data : Buffer.from(data);
      const message = record(JSON.parse(bytes.toString('utf8')));
      const status = record(message.status);
      if (message.type === 'status' && predicate(status)) {
        clearTimeout(timer);
        socket.off('message', onMessage);
        resolve(status);
      }
    };
    socket.on('message', onMessage);
  });
}

test('status feed pushes the current view and every change', async () => {
  await withApi({}, async ({ h, wsUrl }) => {
    await h.addMedia('a.mp4');
    const socket = new WebSocket(wsUrl('/api/events'));
    const initial = nextMessage(socket, () => true);
    assert.equal((await initial).state, 'idle');

    const playing = nextMessage(socket, (status) => status.state === 'playing');
    await h.player.startSession('a.mp4');
    assert.equal((await playing).currentFile, 'a.mp4');

    const paused = nextMessage(socket, (status) => status.state === 'paused');
    await h.player.pause();
    assert.equal((await paused).isPaused, true);
    socket.close();
  });
});

test('upgrades on other paths are refused', async () => {
  await withApi({}, async ({ wsUrl }) => {
    const socket = new WebSocket(wsUrl('/api/other'));
    const failed = await new Promise<boolean>((resolve) => {
      socket.once('open', () => resolve(false));
      socket.once('error', () => resolve(true));
    });
    assert.equal(failed, true);
  });
});

async function withBodyServer(
  maxBytes: number,
  fn: (url: string, results: unknown[]) => Promise<void>,
): Promise<void> {
  const results: unknown[] = [];
  const server = http.createServer((req, res) => {
    void readJsonBody(req, res, maxBytes).then((body) => {
      results.push(body);
      if (body !== null && !res.writableEnded) {
        sendJson(res, 200, { ok: true });
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  assert.ok(address && typeof address !== 'string');
  try {
    await fn(`http://127.0.0.1:${address.port}/`, results);
  } finally {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

test('readJsonBody parses valid json and treats an empty body as undefined', async () => {
  await withBodyServer(1024, async (url, results) => {
    const ok = await fetch(url, { method: 'POST', body: '{"ok":true}' });
    assert.equal(ok.status, 200);
    const empty = await fetch(url, { method: 'POST' });
    assert.equal(empty.status, 200);
    assert.deepEqual(results, [{ ok: true }, undefined]);
  });
});

test('readJsonBody answers 400 for invalid json and 413 when oversized', async () => {
  await withBodyServer(16, async (url, results) => {
    const bad = await fetch(url, { method: 'POST', body: '{"bad":' });
    assert.equal(bad.status, 400);
    assert.equal(record(await bad.json()).error, 'invalid-json');

    const big = await fetch(url, { method: 'POST', body: JSON.stringify({ text: 'x'.repeat(32) }) });
    assert.equal(big.status, 413);
    assert.equal(record(await big.json()).error, 'payload-too-large');
    assert.deepEqual(results, [null, null]);
  });
});
