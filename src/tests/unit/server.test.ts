import type { Server } from 'node:http';
import { describe, it, expect, vi, afterEach } from 'vitest';
import type { InterpretationOrchestrator } from '../../core/interpreter/InterpretationOrchestrator.js';
import { ResponseComposer, firstPicker } from '../../core/interpreter/ResponseComposer.js';
import type { DeviceVocabularyPort } from '../../ports/DeviceVocabularyPort.js';
import { VocabularyRefreshJob } from '../../scheduler/VocabularyRefreshJob.js';
import { createApp } from '../../server.js';
import { lexicon, testInterpreter } from '../support/fixtures.js';

let server: Server | undefined;

async function start(
  orchestrator: InterpretationOrchestrator = testInterpreter(),
  loadSnapshot: DeviceVocabularyPort['loadSnapshot'] = vi.fn().mockResolvedValue([])
): Promise<string> {
  const app = createApp({
    orchestrator,
    composer: new ResponseComposer(lexicon, firstPicker),
    refreshJob: new VocabularyRefreshJob({ name: 'stub', loadSnapshot }, orchestrator),
    locales: ['es', 'en'],
    defaultLocale: 'es',
  });
  const listening = app.listen(0, '127.0.0.1');
  server = listening;
  await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
  const address = listening.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  return `http://127.0.0.1:${address.port}`;
}

function post(url: string, body: string): Promise<Response> {
  return fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body });
}

afterEach(async () => {
  const current = server;
  server = undefined;
  if (current) {
    await new Promise<void>((resolve, reject) => current.close((error) => (error ? reject(error) : resolve())));
  }
});

describe('HTTP server', () => {
  describe('POST /interpret', () => {
    it('should interpret a command', async () => {
      const base = await start();

      const response = await post(`${base}/interpret`, JSON.stringify({ text: 'Enciende la luz del comedor' }));

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        success: true,
        data: { intent: 'turn_on', device: 'luz_comedor', negated: false },
        source: 'rules',
        originalText: 'Enciende la luz del comedor',
        confidenceNote: null,
        responseText: 'Listo, luz comedor encendido',
      });
    });

    it('should answer negated commands in the requested locale', async () => {
      const base = await start();

      const response = await post(
        `${base}/interpret`,
        JSON.stringify({ text: 'No enciendas la luz del comedor', locale: 'en' })
      );

      await expect(response.json()).resolves.toMatchObject({
        success: true,
        data: { intent: 'turn_on', device: 'luz_comedor', negated: true },
        responseText: 'Got it, luz comedor stays off',
      });
    });

    it('should fall back to the default locale and keep the text', async () => {
      const base = await start();

      const response = await post(
        `${base}/interpret`,
        JSON.stringify({ text: 'enciende la luz del comedor', locale: 'fr' })
      );

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toMatchObject({
        success: true,
        data: { intent: 'turn_on', device: 'luz_comedor', negated: false },
        originalText: 'enciende la luz del comedor',
        responseText: 'Listo, luz comedor encendido',
      });
    });

    it('should interpret long text in full', async () => {
      const base = await start();
      const text = `enciende la luz del comedor ${'por favor '.repeat(200)}`;

      const response = await post(`${base}/interpret`, JSON.stringify({ text }));

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toMatchObject({
        success: true,
        data: { intent: 'turn_on', device: 'luz_comedor', negated: false },
        originalText: text,
      });
    });

    it('should answer 413 for a body over the size limit', async () => {
      const base = await start();

      const response = await post(`${base}/interpret`, JSON.stringify({ text: 'x'.repeat(20_000) }));

      expect(response.status).toBe(413);
    });

    it('should treat a malformed body as empty text', async () => {
      const base = await start();

      const response = await post(`${base}/interpret`, 'not json');

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        success: false,
        data: { intent: 'unknown', device: null, negated: false },
        source: 'rules',
        originalText: '',
        confidenceNote: null,
        responseText: 'No entendí el comando, ¿puedes repetirlo?',
      });
    });
  });

  describe('devices', () => {
    it('should list the current vocabulary in wire form', async () => {
      const base = await start();

      const body: unknown = await (await fetch(`${base}/devices`)).json();

      expect(body).toMatchObject({ count: 6 });
      expect(body).toHaveProperty(['devices', 3], {
        device_key: 'puerta_garage',
        name: 'Porton',
        category: 'door',
        room: 'garage',
        aliases: ['puerta del garage'],
      });
    });

    it('should return one device in wire form', async () => {
      const base = await start();

      const response = await fetch(`${base}/devices/puerta_garage`);

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({
        device_key: 'puerta_garage',
        name: 'Porton',
        category: 'door',
        room: 'garage',
        aliases: ['puerta del garage'],
      });
    });

    it('should answer 404 for an unknown device', async () => {
      const base = await start();

      const response = await fetch(`${base}/devices/nope`);

      expect(response.status).toBe(404);
      await expect(response.json()).resolves.toEqual({ error: 'Device nope not found' });
    });

    it('should reload the vocabulary from its source', async () => {
      const orchestrator = testInterpreter();
      const base = await start(orchestrator, vi.fn().mockResolvedValue([{ device_key: 'fan_1', category: 'fan' }]));

      const response = await fetch(`${base}/devices/reload`, { method: 'POST' });

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toEqual({ ok: true, deviceCount: 1 });
      expect(orchestrator.devices()).toHaveLength(1);
    });

    it('should answer 409 when the reload fails', async () => {
      const base = await start(testInterpreter(), vi.fn().mockRejectedValue(new Error('offline')));

      const response = await fetch(`${base}/devices/reload`, { method: 'POST' });

      expect(response.status).toBe(409);
      await expect(response.json()).resolves.toEqual({ ok: false, error: 'offline' });
    });
  });

  it('should report health', async () => {
    const base = await start();

    const body: unknown = await (await fetch(`${base}/health`)).json();

    expect(body).toMatchObject({ status: 'ok', devices: 6, fallback: null });
    expect(body).toHaveProperty('timestamp', expect.any(String));
  });
});
