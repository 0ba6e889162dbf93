import { ModelAcquisitionError, errorMessage, type ModelAttempt } from '../errors.js';
import type { ModelHandle } from '../types.js';
import type { ModelLookup } from './geminiClient.js';

/**
 * Resolves the model used for generation. Identifiers are tried in order and
 * the first one the service recognizes wins. The handle is kept for the
 * lifetime of the provider; a failed acquisition is not remembered.
 */
export class ModelProvider {
  private handle: ModelHandle | null = null;
  private pending: Promise<ModelHandle> | null = null;

  constructor(
    private readonly models: ModelLookup,
    private readonly chain: readonly string[]
  ) {}

  acquire(): Promise<ModelHandle> {
    if (this.handle) {
      return Promise.resolve(this.handle);
    }
    if (!this.pending) {
      this.pending = this.resolveChain().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async resolveChain(): Promise<ModelHandle> {
    const attempts: ModelAttempt[] = [];

    for (const [index, name] of this.chain.entries()) {
      try {
        const model = await this.models.get({ model: name });
        const handle: ModelHandle = Object.freeze({
          name,
          displayName: model.displayName,
          fallback: index > 0,
        });
        console.log(`[Model] Using ${name}${handle.fallback ? ' (fallback)' : ''}`);
        this.handle = handle;
        return handle;
      } catch (error) {
        const message = errorMessage(error);
        console.warn(`[Model] Could not load ${name}: ${message}`);
        attempts.push({ model: name, error: message });
      }
    }

    throw new ModelAcquisitionError(attempts);
  }
}
