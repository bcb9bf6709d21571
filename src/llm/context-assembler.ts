import { MessageRole } from '../chats/schemas/message.schema';

export interface ChatTurn {
  role: MessageRole;
  content: string;
}

export interface IngredientFacts {
  name: string;
  caloriesPerGram: number;
  proteinPerGram: number;
  fatPerGram: number;
  carbsPerGram: number;
}

export interface MacroTargets {
  macroEnabled: boolean;
  proteinPct: number | null;
  carbsPct: number | null;
  fatPct: number | null;
}

/** Per-user data injected into prompts. `settings` is null when the user never saved any. */
export interface PromptContext {
  ingredients: IngredientFacts[];
  settings: MacroTargets | null;
}

export const INGREDIENT_HEADER = '\n\nKnown ingredient nutritional data (per gram):\n';
export const INGREDIENT_FOOTER =
  '\n\nSearch for other ingredients if they are not found in the list above.';

export function formatIngredientLine(i: IngredientFacts): string {
  return (
    `- ${i.name}: ${i.caloriesPerGram.toFixed(2)} cal, ` +
    `${i.proteinPerGram.toFixed(2)}g protein, ` +
    `${i.fatPerGram.toFixed(2)}g fat, ` +
    `${i.carbsPerGram.toFixed(2)}g carbs\n`
  );
}

/** Suffix for user turns; empty string when the user has no ingredients. */
export function buildIngredientBlock(ingredients: IngredientFacts[]): string {
  if (ingredients.length === 0) return '';
  return INGREDIENT_HEADER + ingredients.map(formatIngredientLine).join('') + INGREDIENT_FOOTER;
}

/** Suffix for the newest user turn; empty unless macro mode is on with all three targets set. */
export function buildMacroClause(settings: MacroTargets | null): string {
  if (!settings || !settings.macroEnabled) return '';
  const { proteinPct, carbsPct, fatPct } = settings;
  if (proteinPct == null || carbsPct == null || fatPct == null) return '';
  return `\n\nMeal composition must be ${proteinPct}% protein, ${carbsPct}% carbs, ${fatPct}% fat.`;
}

/**
 * Ordered message list for one completion call: optional system prompt, prior history,
 * then the new user turn. Every user turn (replayed or new) carries the ingredient block,
 * so prompt size grows with history length.
 */
export function assembleMessages(
  systemPrompt: string,
  history: ChatTurn[],
  newUserMessage: string,
  context: PromptContext,
): ChatTurn[] {
  const ingredientBlock = buildIngredientBlock(context.ingredients);
  const messages: ChatTurn[] = [];
  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  for (const turn of history) {
    messages.push({
      role: turn.role,
      content: turn.role === 'user' ? turn.content + ingredientBlock : turn.content,
    });
  }
  messages.push({
    role: 'user',
    content: newUserMessage + buildMacroClause(context.settings) + ingredientBlock,
  });
  return messages;
}
