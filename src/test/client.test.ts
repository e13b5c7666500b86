import test from 'node:test';
import assert from 'node:assert/strict';
import { ReadableStream } from 'node:stream/web';
import { HttpClient, HttpError, UpstreamError, type FetchFn } from '../http/client.js';
import { Logger } from '../util/logger.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function recordingLogger(level: 'debug' | 'silent' = 'silent') {
  const lines: string[] = [];
  return { logger: new Logger(level, (line) => lines.push(line)), lines };
}

test('getJson returns the parsed body and sends JSON headers', async () => {
  const seen: Headers[] = [];
  const fetchFn: FetchFn = async (_url, init) => {
    seen.push(new Headers(init.headers));
    return jsonResponse({ ok: true });
  };
  const client = new HttpClient({ timeoutMs: 1000, logger: new Logger('silent'), userAgent: 'test-agent/1.0', fetch: fetchFn });

  const data = await client.getJson(new URL('https://example.test/v1/search'));
  assert.deepEqual(data, { ok: true });
  assert.equal(seen.length, 1);
  assert.equal(seen[0].get('accept'), 'application/json');
  assert.equal(seen[0].get('user-agent'), 'test-agent/1.0');
});

test('a 4xx response raises HttpError without retrying', async () => {
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    calls++;
    return jsonResponse({ error: true, reason: 'bad parameter' }, 400);
  };
  const client = new HttpClient({ timeoutMs: 1000, logger: new Logger('silent'), fetch: fetchFn, retryDelayMs: 1 });

  await assert.rejects(client.getJson(new URL('https://example.test/v1/forecast')), (err: unknown) => {
    assert.ok(err instanceof HttpError);
    assert.equal(err.status, 400);
    assert.deepEqual(err.body, { error: true, reason: 'bad parameter' });
    return true;
  });
  assert.equal(calls, 1);
});

test('429 and 5xx responses are retried', async () => {
  const statuses = [503, 429];
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    const status = statuses[calls++];
    return status ? jsonResponse({}, status) : jsonResponse({ results: [] });
  };
  const client = new HttpClient({ timeoutMs: 1000, logger: new Logger('silent'), fetch: fetchFn, retryDelayMs: 1 });

  assert.deepEqual(await client.getJson(new URL('https://example.test/')), { results: [] });
  assert.equal(calls, 3);
});

test('retries stop after three attempts', async () => {
  let calls = 0;
  const fetchFn: FetchFn = async () => {
    calls++;
    return new Response('oops', { status: 500 });
  };
  const client = new HttpClient({ timeoutMs: 1000, logger: new Logger('silent'), fetch: fetchFn, retryDelayMs: 1 });

  await assert.rejects(client.getJson(new URL('https://example.test/')), (err: unknown) => {
    assert.ok(err instanceof HttpError);
    assert.equal(err.status, 500);
    assert.equal(err.body, 'oops');
    return true;
  });
  assert.equal(calls, 3);
});

test('a slow upstream raises a timeout UpstreamError', async () => {
  const fetchFn: FetchFn = (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  const client = new HttpClient({ timeoutMs: 20, logger: new Logger('silent'), fetch: fetchFn });

  await assert.rejects(client.getJson(new URL('https://example.test/')), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.reason, 'timeout');
    assert.equal(err.message, 'Request timeout after 20ms for GET https://example.test/');
    return true;
  });
});

test('a body that stalls past the timeout raises a timeout UpstreamError', async () => {
  const fetchFn: FetchFn = async (_url, init) => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode('{"results":'));
        init.signal?.addEventListener('abort', () => controller.error(new Error('aborted')), { once: true });
      },
    });
    return new Response(body, { status: 200, headers: { 'Content-Type': 'application/json' } });
  };
  const client = new HttpClient({ timeoutMs: 30, logger: new Logger('silent'), fetch: fetchFn });

  await assert.rejects(client.getJson(new URL('https://example.test/')), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.reason, 'timeout');
    assert.equal(err.message, 'Request timeout after 30ms for GET https://example.test/');
    return true;
  });
});

test('a body that breaks off before the timeout raises a network UpstreamError', async () => {
  const fetchFn: FetchFn = async () => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new Error('socket hang up'));
      },
    });
    return new Response(body, { status: 200 });
  };
  const client = new HttpClient({ timeoutMs: 1000, logger: new Logger('silent'), fetch: fetchFn });

  await assert.rejects(client.getJson(new URL('https://example.test/')), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.reason, 'network');
    return true;
  });
});

test('a failed connection raises a network UpstreamError', async () => {
  const fetchFn: FetchFn = async () => {
    throw new TypeError('fetch failed');
  };
  const client = new HttpClient({ timeoutMs: 1000, logger: new Logger('silent'), fetch: fetchFn });

  await assert.rejects(client.getJson(new URL('https://example.test/')), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.reason, 'network');
    assert.equal(err.message, 'Network error for GET https://example.test/: fetch failed');
    return true;
  });
});

test('a non-JSON body raises a malformed UpstreamError', async () => {
  const fetchFn: FetchFn = async () => new Response('<html>maintenance</html>', { status: 200 });
  const client = new HttpClient({ timeoutMs: 1000, logger: new Logger('silent'), fetch: fetchFn });

  await assert.rejects(client.getJson(new URL('https://example.test/')), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.reason, 'malformed');
    return true;
  });
});

test('request logging redacts the apikey parameter', async () => {
  const { logger, lines } = recordingLogger('debug');
  const fetchFn: FetchFn = async () => jsonResponse({});
  const client = new HttpClient({ timeoutMs: 1000, logger, fetch: fetchFn });

  await client.getJson(new URL('https://example.test/v1/forecast?latitude=1&apikey=test-secret'));
  assert.ok(lines.some((line) => line.endsWith(' DEBUG HTTP GET https://example.test/v1/forecast?latitude=1&apikey=<redacted>\n')));
  assert.ok(lines.every((line) => !line.includes('test-secret')));
});
