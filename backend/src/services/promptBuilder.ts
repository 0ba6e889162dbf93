import type { RecipePreferences } from '../types.js';

/**
 * Render the chef prompt. Every preference is inserted as given; a missing
 * cuisine or diet is written as "any" / "no particular dietary".
 */
export function buildRecipePrompt(preferences: RecipePreferences): string {
  const cuisine = preferences.cuisine ?? 'any';
  const diet = preferences.dietaryPreference ?? 'no particular dietary';
  const [first, second, third] = preferences.ingredients;

  return `I am a Chef. I need to create ${cuisine} recipes for customers who want ${diet} meals.
However, don't include recipes that use ingredients with the customer's ${preferences.allergy} allergy.
I have ${first}, ${second}, and ${third} in my kitchen and other ingredients.
The customer's wine preference is ${preferences.wine}.
Please provide some meal recommendations.
For each recommendation include preparation instructions, time to prepare and the recipe title at the beginning of the response.
Then include the wine pairing for each recommendation.
At the end of the recommendation provide the calories associated with the meal and the nutritional facts.`;
}
