// Shared types for the backend API

import type { HarmBlockThreshold, HarmCategory } from '@google/genai';

// ============================================================================
// Preferences & prompt
// ============================================================================

export const WINE_PREFERENCES = ['Red', 'White', 'None'] as const;
export type WinePreference = (typeof WINE_PREFERENCES)[number];

export interface RecipePreferences {
  cuisine?: string;
  dietaryPreference?: string;
  allergy: string;
  ingredients: [string, string, string];
  wine: WinePreference;
}

// ============================================================================
// Model & generation
// ============================================================================

export interface ModelHandle {
  readonly name: string;
  readonly displayName?: string;
  /** True when the preferred model was unavailable and a fallback was used */
  readonly fallback: boolean;
}

export interface SafetyRule {
  readonly category: HarmCategory;
  readonly threshold: HarmBlockThreshold;
}

export type SafetyPolicy = readonly SafetyRule[];

export interface GenerationConfig {
  readonly temperature: number;
  readonly maxOutputTokens: number;
  readonly safetyPolicy: SafetyPolicy;
}

export interface GenerationRequest {
  readonly model: ModelHandle;
  readonly prompt: string;
  readonly config: GenerationConfig;
}

// One streamed chunk, classified when it arrives
export type Fragment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'empty' };

export interface GenerationResult {
  text: string;
  fragmentCount: number;
  emptyFragmentCount: number;
  model: string;
}

// ============================================================================
// API responses
// ============================================================================

export type SuggestionStatus = 'generated' | 'empty';

export interface RecipeSuggestion {
  status: SuggestionStatus;
  recipes: string;
  prompt: string;
  model: string;
}

// Events for SSE streaming
export type SuggestionEvent =
  | { type: 'connected' }
  | { type: 'fragment'; index: number; text: string }
  | { type: 'complete'; result: RecipeSuggestion }
  | { type: 'error'; code: string; error: string };
