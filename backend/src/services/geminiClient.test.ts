import { HarmBlockThreshold, HarmCategory } from '@google/genai';
import { describe, expect, it } from 'vitest';
import type { AppConfig } from '../config.js';
import { blockedChunk, fakeStreamer, textChunk } from '../testing/fakes.js';
import type { Fragment, GenerationRequest } from '../types.js';
import { createGeminiClient, geminiClientOptions, streamFragments, toFragment } from './geminiClient.js';
import { buildGenerationConfig, buildSafetyPolicy } from './generationConfig.js';

async function collect(source: AsyncIterable<Fragment>): Promise<Fragment[]> {
  const out: Fragment[] = [];
  for await (const fragment of source) {
    out.push(fragment);
  }
  return out;
}

describe('toFragment', () => {
  it('reads the text of a chunk', () => {
    expect(toFragment(textChunk('Preheat the oven.'))).toEqual({ kind: 'text', text: 'Preheat the oven.' });
  });

  it('keeps an empty string as text', () => {
    expect(toFragment(textChunk(''))).toEqual({ kind: 'text', text: '' });
  });

  it('marks a safety-blocked chunk as empty', () => {
    expect(toFragment(blockedChunk())).toEqual({ kind: 'empty' });
  });
});

describe('streamFragments', () => {
  const request: GenerationRequest = {
    model: { name: 'gemini-2.0-pro-exp', fallback: true },
    prompt: 'Plan a dinner with salmon.',
    config: buildGenerationConfig({
      temperature: 0.4,
      maxOutputTokens: 512,
      safetyPolicy: buildSafetyPolicy({
        [HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT]: HarmBlockThreshold.BLOCK_ONLY_HIGH,
      }),
    }),
  };

  it('sends the model, prompt and config unchanged', async () => {
    const streamer = fakeStreamer([]);

    await collect(streamFragments(streamer, request));

    expect(streamer.generateContentStream).toHaveBeenCalledWith({
      model: 'gemini-2.0-pro-exp',
      contents: 'Plan a dinner with salmon.',
      config: {
        temperature: 0.4,
        maxOutputTokens: 512,
        safetySettings: [
          { category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_NONE },
          { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_NONE },
          { category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_NONE },
          { category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH },
        ],
      },
    });
  });

  it('yields fragments in delivery order', async () => {
    const streamer = fakeStreamer([textChunk('first'), blockedChunk(), textChunk('third')]);

    const fragments = await collect(streamFragments(streamer, request));

    expect(fragments).toEqual([{ kind: 'text', text: 'first' }, { kind: 'empty' }, { kind: 'text', text: 'third' }]);
  });

  it('does not open the stream until it is read', () => {
    const streamer = fakeStreamer([textChunk('unused')]);
    streamFragments(streamer, request);
    expect(streamer.generateContentStream).not.toHaveBeenCalled();
  });
});

describe('createGeminiClient', () => {
  const base: Omit<AppConfig, 'credentials'> = {
    port: 3001,
    modelChain: ['gemini-2.0-flash-001'],
    temperature: 0.8,
    maxOutputTokens: 2048,
    timeoutMs: 1000,
  };

  it('uses the Developer API with an API key', () => {
    const ai = createGeminiClient({ ...base, credentials: { kind: 'apiKey', apiKey: 'test-key' } });
    expect(ai.vertexai).toBe(false);
  });

  it('uses Vertex AI when configured', () => {
    const ai = createGeminiClient({
      ...base,
      credentials: { kind: 'vertex', project: 'test-project', location: 'us-west1' },
    });
    expect(ai.vertexai).toBe(true);
  });

  it('sends the configured timeout with every request', () => {
    expect(geminiClientOptions({ ...base, credentials: { kind: 'apiKey', apiKey: 'test-key' } })).toEqual({
      vertexai: false,
      apiKey: 'test-key',
      httpOptions: { timeout: 1000 },
    });
    expect(
      geminiClientOptions({ ...base, credentials: { kind: 'vertex', project: 'test-project', location: 'us-west1' } })
    ).toEqual({
      vertexai: true,
      project: 'test-project',
      location: 'us-west1',
      httpOptions: { timeout: 1000 },
    });
  });
});
