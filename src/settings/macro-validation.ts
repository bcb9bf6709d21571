export interface MacroSettingsInput {
  macroEnabled: boolean;
  proteinPct: number | null;
  carbsPct: number | null;
  fatPct: number | null;
}

const SUM_TOLERANCE = 1e-6;

/**
 * Returns why a settings update is rejected, or null if it is acceptable.
 * Percentages only have to add up when macro mode is enabled.
 */
export function macroSettingsViolation(input: MacroSettingsInput): string | null {
  const pcts = { protein_pct: input.proteinPct, carbs_pct: input.carbsPct, fat_pct: input.fatPct };
  for (const [key, value] of Object.entries(pcts)) {
    if (value != null && (!Number.isFinite(value) || value < 0 || value > 100)) {
      return `${key} must be between 0 and 100`;
    }
  }
  if (!input.macroEnabled) return null;

  const { proteinPct, carbsPct, fatPct } = input;
  if (proteinPct == null || carbsPct == null || fatPct == null) {
    return 'protein_pct, carbs_pct and fat_pct are required when macro_enabled is true';
  }
  const sum = proteinPct + carbsPct + fatPct;
  if (Math.abs(sum - 100) > SUM_TOLERANCE) {
    return `Macro percentages must sum to 100 (got ${sum})`;
  }
  return null;
}
