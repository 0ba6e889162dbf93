import {
  GoogleGenAI,
  type GenerateContentParameters,
  type GenerateContentResponse,
  type GetModelParameters,
  type GoogleGenAIOptions,
  type Model,
} from '@google/genai';
import type { AppConfig } from '../config.js';
import type { Fragment, GenerationRequest } from '../types.js';

// ============================================================================
// SDK surfaces
// ============================================================================

// The parts of `ai.models` this backend talks to. Tests pass fakes.
export interface ModelLookup {
  get(params: GetModelParameters): Promise<Model>;
}

export interface ContentStreamer {
  generateContentStream(params: GenerateContentParameters): Promise<AsyncGenerator<GenerateContentResponse>>;
}

// The request timeout applies to the whole streaming call
export function geminiClientOptions(config: AppConfig): GoogleGenAIOptions {
  const httpOptions = { timeout: config.timeoutMs };
  const { credentials } = config;

  if (credentials.kind === 'vertex') {
    return {
      vertexai: true,
      project: credentials.project,
      location: credentials.location,
      httpOptions,
    };
  }
  return { vertexai: false, apiKey: credentials.apiKey, httpOptions };
}

export function createGeminiClient(config: AppConfig): GoogleGenAI {
  return new GoogleGenAI(geminiClientOptions(config));
}

// ============================================================================
// Streaming transport
// ============================================================================

const EMPTY_FRAGMENT: Fragment = { kind: 'empty' };

/**
 * Classify a streamed chunk. Chunks without text (blocked by safety
 * filters, or carrying only finish metadata) become empty fragments.
 */
export function toFragment(chunk: GenerateContentResponse): Fragment {
  const text = chunk.text;
  return typeof text === 'string' ? { kind: 'text', text } : EMPTY_FRAGMENT;
}

/**
 * Open a streaming call and yield its chunks as fragments in delivery order.
 * The sequence is lazy and can be consumed once.
 */
export async function* streamFragments(
  streamer: ContentStreamer,
  request: GenerationRequest
): AsyncGenerator<Fragment> {
  const { model, prompt, config } = request;

  const stream = await streamer.generateContentStream({
    model: model.name,
    contents: prompt,
    config: {
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      safetySettings: config.safetyPolicy.map(rule => ({
        category: rule.category,
        threshold: rule.threshold,
      })),
    },
  });

  for await (const chunk of stream) {
    yield toFragment(chunk);
  }
}
