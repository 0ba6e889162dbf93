import dotenv from 'dotenv';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { RecipeAssistantError, errorMessage } from './errors.js';
import { createGeminiClient } from './services/geminiClient.js';
import { GenerationClient } from './services/generationClient.js';
import { buildGenerationConfig } from './services/generationConfig.js';
import { ModelProvider } from './services/modelProvider.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const ai = createGeminiClient(config);

  // Resolved once; every request uses this handle
  const model = await new ModelProvider(ai.models, config.modelChain).acquire();

  const app = createApp({
    client: new GenerationClient(ai.models),
    model,
    config: buildGenerationConfig({
      temperature: config.temperature,
      maxOutputTokens: config.maxOutputTokens,
    }),
  });

  app.listen(config.port, () => {
    console.log(`Recipe assistant API running on http://localhost:${config.port}`);
  });
}

main().catch((error: unknown) => {
  const code = error instanceof RecipeAssistantError ? error.code : 'STARTUP_FAILED';
  console.error(`[Server] ${code}: ${errorMessage(error)}`);
  process.exit(1);
});
