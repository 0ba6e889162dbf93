import express, { type Express } from 'express';
import cors from 'cors';
import { errorHandler } from './middleware/errorHandler.js';
import { createModelsRouter } from './routes/models.js';
import { createRecipesRouter } from './routes/recipes.js';
import type { RecipeServiceDeps } from './services/recipeService.js';

export function createApp(deps: RecipeServiceDeps): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  // Routes
  app.use('/api/recipes', createRecipesRouter(deps));
  app.use('/api/model', createModelsRouter(deps.model, deps.config));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), model: deps.model.name });
  });

  app.use(errorHandler);

  return app;
}
