import { HarmBlockThreshold, HarmCategory } from '@google/genai';
import { describe, expect, it } from 'vitest';
import { PERMISSIVE_SAFETY_POLICY, SAFETY_CATEGORIES, buildGenerationConfig, buildSafetyPolicy } from './generationConfig.js';

describe('buildSafetyPolicy', () => {
  it('disables blocking for every base category by default', () => {
    expect(PERMISSIVE_SAFETY_POLICY).toEqual(
      SAFETY_CATEGORIES.map(category => ({ category, threshold: HarmBlockThreshold.BLOCK_NONE }))
    );
    expect(PERMISSIVE_SAFETY_POLICY).toHaveLength(4);
  });

  it('sets thresholds per category', () => {
    const policy = buildSafetyPolicy({
      [HarmCategory.HARM_CATEGORY_HATE_SPEECH]: HarmBlockThreshold.BLOCK_LOW_AND_ABOVE,
    });

    expect(policy.map(rule => rule.threshold)).toEqual([
      HarmBlockThreshold.BLOCK_NONE,
      HarmBlockThreshold.BLOCK_LOW_AND_ABOVE,
      HarmBlockThreshold.BLOCK_NONE,
      HarmBlockThreshold.BLOCK_NONE,
    ]);
  });

  it('uses the given default for categories without an override', () => {
    const policy = buildSafetyPolicy({}, HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE);
    expect(new Set(policy.map(rule => rule.threshold))).toEqual(new Set([HarmBlockThreshold.BLOCK_MEDIUM_AND_ABOVE]));
  });

  it('appends categories outside the base set', () => {
    const policy = buildSafetyPolicy({
      [HarmCategory.HARM_CATEGORY_CIVIC_INTEGRITY]: HarmBlockThreshold.BLOCK_ONLY_HIGH,
    });

    expect(policy).toHaveLength(5);
    expect(policy[4]).toEqual({
      category: HarmCategory.HARM_CATEGORY_CIVIC_INTEGRITY,
      threshold: HarmBlockThreshold.BLOCK_ONLY_HIGH,
    });
  });
});

describe('buildGenerationConfig', () => {
  it('bundles the permissive policy when none is given', () => {
    const config = buildGenerationConfig({ temperature: 0.8, maxOutputTokens: 2048 });
    expect(config).toEqual({ temperature: 0.8, maxOutputTokens: 2048, safetyPolicy: PERMISSIVE_SAFETY_POLICY });
    expect(Object.isFrozen(config)).toBe(true);
  });
});
