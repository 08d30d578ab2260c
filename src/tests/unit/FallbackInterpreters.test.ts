import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createFallbackInterpreter } from '../../adapters/fallback/createFallbackInterpreter.js';
import type { FallbackConfig } from '../../adapters/fallback/createFallbackInterpreter.js';
import { HttpFallbackInterpreter } from '../../adapters/fallback/HttpFallbackInterpreter.js';
import {
  LLMFallbackInterpreter,
  extractJson,
  formatCatalogue,
} from '../../adapters/fallback/LLMFallbackInterpreter.js';
import { parseVocabulary } from '../../core/nlp/VocabularySnapshot.js';
import type { LLMPort } from '../../ports/LLMPort.js';
import { ConfigError, FallbackError } from '../../utils/errors.js';

const catalogue = parseVocabulary([
  { device_key: 'luz_sala', category: 'light', room: 'sala' },
  { device_key: 'alarma', category: 'alarm' },
]);

function fakeLLM(text: string): LLMPort & { generateText: ReturnType<typeof vi.fn> } {
  return { generateText: vi.fn().mockResolvedValue({ text }) };
}

describe('LLMFallbackInterpreter', () => {
  const signal = new AbortController().signal;

  it('should fill the prompt and parse the model answer', async () => {
    const llm = fakeLLM('Sure: {"intent":"open","device":"luz_sala"}');
    const fallback = new LLMFallbackInterpreter(
      llm,
      () => catalogue,
      '{{DEVICES}}\n{{NEGATION_HINT}}\n{{COMMAND}}'
    );

    const answer = await fallback.interpret({ text: 'abre la "puerta"', hintNegated: true, locale: 'es' }, signal);

    expect(answer).toEqual({ intent: 'open', device: 'luz_sala' });
    expect(llm.generateText).toHaveBeenCalledWith(
      {
        prompt: "luz_sala|light|sala\nalarma|alarm|-\nthe speaker phrased this as a negation\nabre la 'puerta'",
        maxTokens: 100,
        temperature: 0,
      },
      signal
    );
  });

  it('should load the bundled prompt', async () => {
    const llm = fakeLLM('{"intent":"status","device":null}');
    const fallback = new LLMFallbackInterpreter(llm, () => catalogue);

    await fallback.interpret({ text: 'como esta la sala', hintNegated: false, locale: 'es' }, signal);

    const [request] = llm.generateText.mock.calls[0] ?? [];
    expect(request.prompt).toContain('luz_sala|light|sala');
    expect(request.prompt).toContain('Command: "como esta la sala"');
    expect(request.prompt).toContain('no negation was detected');
  });

  it('should reject empty model answers', async () => {
    const fallback = new LLMFallbackInterpreter(fakeLLM(''), () => catalogue, '{{COMMAND}}');
    await expect(fallback.interpret({ text: 'x', hintNegated: false, locale: 'es' }, signal)).rejects.toThrow(
      'Language model returned an empty answer'
    );
  });

  it('should read the catalogue at call time', async () => {
    let devices = catalogue;
    const llm = fakeLLM('{}');
    const fallback = new LLMFallbackInterpreter(llm, () => devices, '{{DEVICES}}');

    devices = [];
    await fallback.interpret({ text: 'x', hintNegated: false, locale: 'es' }, signal);

    expect(llm.generateText.mock.calls[0]?.[0]).toMatchObject({ prompt: '(none)' });
  });
});

describe('extractJson', () => {
  it('should pick the JSON object out of surrounding text', () => {
    expect(extractJson('Answer:\n{"intent":"close","device":null}\nDone')).toEqual({ intent: 'close', device: null });
  });

  it('should fail without a JSON object', () => {
    expect(() => extractJson('no idea')).toThrow('No JSON object in model answer: no idea');
  });

  it('should fail on broken JSON', () => {
    expect(() => extractJson('{intent: open}')).toThrow(FallbackError);
  });
});

describe('formatCatalogue', () => {
  it('should list one device per line', () => {
    expect(formatCatalogue(catalogue)).toBe('luz_sala|light|sala\nalarma|alarm|-');
  });
});

describe('HttpFallbackInterpreter', () => {
  const fetchMock = vi.fn<typeof fetch>();
  const fallback = new HttpFallbackInterpreter('http://interpreter.test/interpret');
  const request = { text: 'abre la puerta', hintNegated: false, locale: 'es' as const };

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post the command and return the JSON answer', async () => {
    fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ intent: 'open', device: null })));

    const answer = await fallback.interpret(request, new AbortController().signal);

    expect(answer).toEqual({ intent: 'open', device: null });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('http://interpreter.test/interpret');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ text: 'abre la puerta', hint_negated: false, locale: 'es' });
  });

  it('should wrap network failures', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(fallback.interpret(request, new AbortController().signal)).rejects.toThrow(
      'Fallback service unreachable'
    );
  });

  it('should report error statuses', async () => {
    fetchMock.mockResolvedValueOnce(new Response('busy', { status: 503 }));
    await expect(fallback.interpret(request, new AbortController().signal)).rejects.toThrow(
      'Fallback service error: 503'
    );
  });

  it('should reject non-JSON bodies', async () => {
    fetchMock.mockResolvedValueOnce(new Response('not json'));
    await expect(fallback.interpret(request, new AbortController().signal)).rejects.toThrow(
      'Fallback service returned invalid JSON'
    );
  });
});

describe('createFallbackInterpreter', () => {
  const base: FallbackConfig = {
    fallbackProvider: 'disabled',
    ollamaBaseUrl: 'http://localhost:11434',
    ollamaModel: 'llama3.2',
  };
  const devices = () => catalogue;

  it('should return null when disabled', () => {
    expect(createFallbackInterpreter(base, devices)).toBeNull();
  });

  it('should build the http interpreter', () => {
    const fallback = createFallbackInterpreter(
      { ...base, fallbackProvider: 'http', fallbackUrl: 'http://interpreter.test' },
      devices
    );
    expect(fallback).toBeInstanceOf(HttpFallbackInterpreter);
    expect(() => createFallbackInterpreter({ ...base, fallbackProvider: 'http' }, devices)).toThrow(ConfigError);
  });

  it('should build a language model interpreter', () => {
    const fallback = createFallbackInterpreter({ ...base, fallbackProvider: 'ollama' }, devices);
    expect(fallback).toBeInstanceOf(LLMFallbackInterpreter);
    expect(fallback?.name).toBe('llm');
  });

  it('should fail every call when the anthropic key is missing', async () => {
    const fallback = createFallbackInterpreter({ ...base, fallbackProvider: 'anthropic' }, devices);
    await expect(
      fallback?.interpret({ text: 'hola', hintNegated: false, locale: 'es' }, new AbortController().signal)
    ).rejects.toThrow('Language model returned an empty answer');
  });
});
