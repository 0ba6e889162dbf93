import { Router } from 'express';
import type { GenerationConfig, ModelHandle } from '../types.js';

export function createModelsRouter(model: ModelHandle, config: GenerationConfig): Router {
  const router = Router();

  /**
   * GET /api/model
   * The model in use and the sampling settings sent with each request
   */
  router.get('/', (_req, res) => {
    res.json({
      name: model.name,
      displayName: model.displayName ?? null,
      fallback: model.fallback,
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
      safetySettings: config.safetyPolicy,
    });
  });

  return router;
}
