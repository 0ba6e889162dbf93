import { HarmBlockThreshold, HarmCategory } from '@google/genai';
import type { GenerationConfig, SafetyPolicy, SafetyRule } from '../types.js';

// Categories every policy sets explicitly, in the order they are sent
export const SAFETY_CATEGORIES: readonly HarmCategory[] = [
  HarmCategory.HARM_CATEGORY_HARASSMENT,
  HarmCategory.HARM_CATEGORY_HATE_SPEECH,
  HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
  HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
];

export type SafetyOverrides = Partial<Record<HarmCategory, HarmBlockThreshold>>;

/**
 * Build a per-category safety policy. Categories without an override get
 * `fallbackThreshold`; overrides for categories outside the base set are
 * appended after it.
 */
export function buildSafetyPolicy(
  overrides: SafetyOverrides = {},
  fallbackThreshold: HarmBlockThreshold = HarmBlockThreshold.BLOCK_NONE
): SafetyPolicy {
  const rules: SafetyRule[] = SAFETY_CATEGORIES.map(category => ({
    category,
    threshold: overrides[category] ?? fallbackThreshold,
  }));

  for (const category of Object.values(HarmCategory)) {
    const threshold = overrides[category];
    if (threshold && !SAFETY_CATEGORIES.includes(category)) {
      rules.push({ category, threshold });
    }
  }

  return Object.freeze(rules.map(rule => Object.freeze(rule)));
}

export const PERMISSIVE_SAFETY_POLICY: SafetyPolicy = buildSafetyPolicy();

export function buildGenerationConfig(options: {
  temperature: number;
  maxOutputTokens: number;
  safetyPolicy?: SafetyPolicy;
}): GenerationConfig {
  return Object.freeze({
    temperature: options.temperature,
    maxOutputTokens: options.maxOutputTokens,
    safetyPolicy: options.safetyPolicy ?? PERMISSIVE_SAFETY_POLICY,
  });
}
