import { WINE_PREFERENCES } from '../types.js';

export const CUISINES = [
  'American',
  'Chinese',
  'French',
  'Indian',
  'Italian',
  'Japanese',
  'Mexican',
  'Turkish',
] as const;

export const DIETARY_PREFERENCES = [
  'Diabetes',
  'Gluten free',
  'Halal',
  'Keto',
  'Kosher',
  'Lactose Intolerance',
  'Paleo',
  'Vegan',
  'Vegetarian',
  'None',
] as const;

export const FORM_DEFAULTS = {
  allergy: 'peanuts',
  ingredients: ['ahi tuna', 'chicken breast', 'tofu'],
  wine: 'Red',
} as const;

export function getRecipeOptions() {
  return {
    cuisines: CUISINES,
    dietaryPreferences: DIETARY_PREFERENCES,
    wine: WINE_PREFERENCES,
    defaults: FORM_DEFAULTS,
  };
}
