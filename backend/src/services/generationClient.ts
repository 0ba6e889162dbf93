import { GenerationError } from '../errors.js';
import type { Fragment, GenerationRequest, GenerationResult } from '../types.js';
import { streamFragments, type ContentStreamer } from './geminiClient.js';

export type FragmentSource = (request: GenerationRequest) => AsyncIterable<Fragment>;

export interface GenerateOptions {
  /** Called for every fragment, in delivery order, before the result is joined */
  onFragment?: (fragment: Fragment, index: number) => void;
}

/**
 * Join fragments in the order they arrived. Empty fragments keep their slot
 * as an empty string so the separator count matches the fragment count.
 */
export async function foldFragments(
  fragments: AsyncIterable<Fragment>,
  onFragment?: GenerateOptions['onFragment']
): Promise<Omit<GenerationResult, 'model'>> {
  const parts: string[] = [];
  let emptyFragmentCount = 0;

  for await (const fragment of fragments) {
    onFragment?.(fragment, parts.length);
    if (fragment.kind === 'text') {
      parts.push(fragment.text);
    } else {
      parts.push('');
      emptyFragmentCount++;
    }
  }

  return {
    text: parts.join(' '),
    fragmentCount: parts.length,
    emptyFragmentCount,
  };
}

/**
 * Runs one streaming generation call per request and folds it into a
 * single result. Stream failures are raised as GenerationError; nothing is
 * retried here.
 */
export class GenerationClient {
  private readonly source: FragmentSource;

  constructor(streamer: ContentStreamer);
  constructor(source: FragmentSource);
  constructor(streamerOrSource: ContentStreamer | FragmentSource) {
    this.source =
      typeof streamerOrSource === 'function'
        ? streamerOrSource
        : request => streamFragments(streamerOrSource, request);
  }

  async generate(request: GenerationRequest, options: GenerateOptions = {}): Promise<GenerationResult> {
    const modelName = request.model.name;
    console.log(`[Gemini] Streaming from ${modelName} (${request.prompt.length} char prompt)`);

    // Errors from onFragment pass through as they are; only the stream's are wrapped
    const folded = await foldFragments(this.guardedStream(request), options.onFragment);

    const result: GenerationResult = { ...folded, model: modelName };
    console.log(
      `[Gemini] Completed: ${result.fragmentCount} fragments (${result.emptyFragmentCount} empty), ${result.text.length} chars`
    );
    console.log(result.text);
    return result;
  }

  private async *guardedStream(request: GenerationRequest): AsyncGenerator<Fragment> {
    try {
      yield* this.source(request);
    } catch (error) {
      const failure = new GenerationError(request.model.name, error);
      console.error(`[Gemini] ${failure.message}`);
      throw failure;
    }
  }
}
