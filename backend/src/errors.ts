/**
 * Error types for the recipe assistant
 */

export class RecipeAssistantError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RecipeAssistantError';
    Object.setPrototypeOf(this, RecipeAssistantError.prototype);
  }
}

export class ConfigError extends RecipeAssistantError {
  constructor(message: string, issues: string[] = []) {
    super(`Invalid configuration: ${message}`, 'CONFIG_ERROR', 500, { issues });
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export interface ModelAttempt {
  model: string;
  error: string;
}

export class ModelAcquisitionError extends RecipeAssistantError {
  constructor(public attempts: ModelAttempt[]) {
    super(
      `No model available (tried ${attempts.map(a => a.model).join(', ') || 'nothing'})`,
      'MODEL_UNAVAILABLE',
      503,
      { attempts }
    );
    this.name = 'ModelAcquisitionError';
    Object.setPrototypeOf(this, ModelAcquisitionError.prototype);
  }
}

export class GenerationError extends RecipeAssistantError {
  constructor(model: string, cause: unknown) {
    super(
      `Generation with ${model} failed: ${errorMessage(cause)}`,
      'GENERATION_FAILED',
      502,
      { model }
    );
    this.name = 'GenerationError';
    this.cause = cause;
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export class ValidationError extends RecipeAssistantError {
  constructor(message: string, public issues: ValidationIssue[] = []) {
    super(message, 'VALIDATION_ERROR', 400, { issues });
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
