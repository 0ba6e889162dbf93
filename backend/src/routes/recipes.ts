import { Router } from 'express';
import { validateBody } from '../middleware/validation.js';
import { toErrorBody } from '../middleware/errorHandler.js';
import { buildRecipePrompt } from '../services/promptBuilder.js';
import { getRecipeOptions } from '../services/recipeOptions.js';
import { suggestRecipes, type RecipeServiceDeps } from '../services/recipeService.js';
import type { Fragment, SuggestionEvent } from '../types.js';
import { RecipePreferencesSchema, toPreferences, type RecipePreferencesBody } from './schemas.js';

export function createRecipesRouter(deps: RecipeServiceDeps): Router {
  const router = Router();

  /**
   * GET /api/recipes/options
   * Choice lists and default values for the preference form
   */
  router.get('/options', (_req, res) => {
    res.json(getRecipeOptions());
  });

  /**
   * POST /api/recipes/prompt
   * Render the prompt for a set of preferences without calling the model
   */
  router.post('/prompt', validateBody(RecipePreferencesSchema), (req, res) => {
    const body: RecipePreferencesBody = req.body;
    res.json({ prompt: buildRecipePrompt(toPreferences(body)) });
  });

  /**
   * POST /api/recipes/suggest
   * Generate recipe suggestions, optionally streaming fragments over SSE
   *
   * Body:
   * {
   *   cuisine?: string,
   *   dietaryPreference?: string,
   *   allergy: string,
   *   ingredients: [string, string, string],
   *   wine: 'Red' | 'White' | 'None'
   * }
   *
   * Headers:
   *   Accept: text/event-stream (for SSE) or application/json
   */
  router.post('/suggest', validateBody(RecipePreferencesSchema), async (req, res, next) => {
    const body: RecipePreferencesBody = req.body;
    const preferences = toPreferences(body);

    const wantsSSE = req.headers.accept?.includes('text/event-stream');

    if (!wantsSSE) {
      try {
        res.json(await suggestRecipes(deps, preferences));
      } catch (error) {
        next(error);
      }
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
    res.flushHeaders();

    const send = (event: SuggestionEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    console.log('[SSE] Client connected');
    send({ type: 'connected' });

    const onFragment = (fragment: Fragment, index: number) => {
      send({ type: 'fragment', index, text: fragment.kind === 'text' ? fragment.text : '' });
    };

    try {
      const result = await suggestRecipes(deps, preferences, onFragment);
      console.log(`[SSE] Complete: ${result.status}, ${result.recipes.length} chars`);
      send({ type: 'complete', result });
    } catch (error) {
      const { body: errorBody } = toErrorBody(error);
      console.error(`[SSE] Error: ${errorBody.error.message}`);
      send({ type: 'error', code: errorBody.error.code, error: errorBody.error.message });
    }
    res.end();
  });

  return router;
}
