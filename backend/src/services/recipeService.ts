import type {
  Fragment,
  GenerationConfig,
  GenerationRequest,
  ModelHandle,
  RecipePreferences,
  RecipeSuggestion,
} from '../types.js';
import type { GenerationClient } from './generationClient.js';
import { buildRecipePrompt } from './promptBuilder.js';

export interface RecipeServiceDeps {
  client: GenerationClient;
  model: ModelHandle;
  config: GenerationConfig;
}

/**
 * Build the prompt for a set of preferences and generate suggestions with it.
 * A result that is blank after trimming (every fragment filtered, or none sent)
 * is reported as `empty` rather than as a failure.
 */
export async function suggestRecipes(
  deps: RecipeServiceDeps,
  preferences: RecipePreferences,
  onFragment?: (fragment: Fragment, index: number) => void
): Promise<RecipeSuggestion> {
  const prompt = buildRecipePrompt(preferences);
  const request: GenerationRequest = Object.freeze({
    model: deps.model,
    prompt,
    config: deps.config,
  });

  const result = await deps.client.generate(request, { onFragment });

  return {
    status: result.text.trim() ? 'generated' : 'empty',
    recipes: result.text,
    prompt,
    model: result.model,
  };
}
