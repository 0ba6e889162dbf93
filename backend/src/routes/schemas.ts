/**
 * Zod validation schemas for API routes
 */

import { z } from 'zod';
import { WINE_PREFERENCES, type RecipePreferences } from '../types.js';

// Free text goes into the prompt exactly as typed, blanks included
const FreeText = z.string().max(200);

// A blank choice means no preference; anything else is kept as sent
const OptionalChoice = z
  .string()
  .max(100)
  .optional()
  .transform(v => (v && v.trim() ? v : undefined));

export const RecipePreferencesSchema = z
  .object({
    cuisine: OptionalChoice,
    dietaryPreference: OptionalChoice,
    allergy: FreeText,
    ingredients: z.tuple([FreeText, FreeText, FreeText]),
    wine: z.enum(WINE_PREFERENCES),
  })
  .strict();

export type RecipePreferencesBody = z.infer<typeof RecipePreferencesSchema>;

export function toPreferences(body: RecipePreferencesBody): RecipePreferences {
  return {
    cuisine: body.cuisine,
    dietaryPreference: body.dietaryPreference,
    allergy: body.allergy,
    ingredients: body.ingredients,
    wine: body.wine,
  };
}
