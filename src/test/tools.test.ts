import test from 'node:test';
import assert from 'node:assert/strict';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { mergeConfig } from '../config.js';
import { createAppContext } from '../context.js';
import type { FetchFn } from '../http/client.js';
import { createWeatherMcpServer } from '../tools/registry.js';
import { Logger } from '../util/logger.js';

const PARIS = { name: 'Paris', latitude: 48.85341, longitude: 2.3488, country: 'France', admin1: 'Île-de-France' };
const CURRENT = { temperature: 17.5, windspeed: 6.2, winddirection: 180, weathercode: 0, time: '2026-10-19T14:00' };

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

async function connect(fetchFn: FetchFn) {
  const config = mergeConfig({}, { log_level: 'silent' });
  const ctx = createAppContext(config, new Logger('silent'), { version: '0.0.0-test', fetch: fetchFn, retryDelayMs: 1 });
  const server = createWeatherMcpServer(ctx, ctx.version);
  const client = new Client({ name: 'weather-test', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return { client, close: () => client.close() };
}

function textOf(result: { [key: string]: unknown; content?: unknown }): string {
  const items: unknown[] = Array.isArray(result.content) ? result.content : [];
  return items
    .map((item) => (item !== null && typeof item === 'object' && 'text' in item && typeof item.text === 'string' ? item.text : ''))
    .join('\n');
}

test('registers the weather tools', async () => {
  const { client, close } = await connect(async () => jsonResponse({}));
  try {
    const { tools } = await client.listTools();
    assert.deepEqual(tools.map((t) => t.name).sort(), ['weather_autocomplete', 'weather_get']);
  } finally {
    await close();
  }
});

test('weather_autocomplete returns suggestions as JSON text', async () => {
  const urls: URL[] = [];
  const { client, close } = await connect(async (url) => {
    urls.push(url);
    return jsonResponse({ results: [PARIS] });
  });
  try {
    const result = await client.callTool({ name: 'weather_autocomplete', arguments: { query: 'Par' } });
    assert.notEqual(result.isError, true);
    assert.deepEqual(JSON.parse(textOf(result)), [PARIS]);
    assert.equal(urls.length, 1);
    assert.equal(urls[0].searchParams.get('count'), '6');
  } finally {
    await close();
  }
});

test('weather_get looks up coordinates without geocoding', async () => {
  const paths: string[] = [];
  const { client, close } = await connect(async (url) => {
    paths.push(url.pathname);
    return jsonResponse({ current_weather: CURRENT });
  });
  try {
    const result = await client.callTool({ name: 'weather_get', arguments: { latitude: 48.85341, longitude: 2.3488 } });
    assert.deepEqual(JSON.parse(textOf(result)), {
      location: { name: '48.853,2.349', latitude: 48.85341, longitude: 2.3488, country: null, admin1: null },
      current: CURRENT,
      hourly: {},
      weather_desc: 'Clear sky',
      weather_icon: '☀️',
    });
    assert.deepEqual(paths, ['/v1/forecast']);
  } finally {
    await close();
  }
});

test('weather_get reports failures as tool errors', async () => {
  const { client, close } = await connect(async () => jsonResponse({ generationtime_ms: 0.1 }));
  try {
    const missing = await client.callTool({ name: 'weather_get', arguments: {} });
    assert.equal(missing.isError, true);
    assert.equal(textOf(missing), 'Weather lookup failed: Provide either city or lat and lon');

    const notFound = await client.callTool({ name: 'weather_get', arguments: { city: 'Atlantis' } });
    assert.equal(notFound.isError, true);
    assert.equal(textOf(notFound), "Weather lookup failed: City 'Atlantis' not found");
  } finally {
    await close();
  }
});
