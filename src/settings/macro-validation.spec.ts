import { macroSettingsViolation } from './macro-validation';

describe('macroSettingsViolation', () => {
  it('accepts percentages that add up to 100', () => {
    expect(
      macroSettingsViolation({ macroEnabled: true, proteinPct: 30, carbsPct: 30, fatPct: 40 }),
    ).toBeNull();
  });

  it('tolerates floating point noise in the sum', () => {
    expect(
      macroSettingsViolation({ macroEnabled: true, proteinPct: 33.3, carbsPct: 33.3, fatPct: 33.4 }),
    ).toBeNull();
  });

  it('rejects percentages that do not add up to 100', () => {
    expect(
      macroSettingsViolation({ macroEnabled: true, proteinPct: 30, carbsPct: 30, fatPct: 30 }),
    ).toBe('Macro percentages must sum to 100 (got 90)');
  });

  it('requires all three percentages when enabled', () => {
    expect(
      macroSettingsViolation({ macroEnabled: true, proteinPct: 50, carbsPct: 50, fatPct: null }),
    ).toBe('protein_pct, carbs_pct and fat_pct are required when macro_enabled is true');
  });

  it('does not check the sum while disabled', () => {
    expect(
      macroSettingsViolation({ macroEnabled: false, proteinPct: 10, carbsPct: 10, fatPct: 10 }),
    ).toBeNull();
    expect(
      macroSettingsViolation({ macroEnabled: false, proteinPct: null, carbsPct: null, fatPct: null }),
    ).toBeNull();
  });

  it('rejects out-of-range values even while disabled', () => {
    expect(
      macroSettingsViolation({ macroEnabled: false, proteinPct: 120, carbsPct: null, fatPct: null }),
    ).toBe('protein_pct must be between 0 and 100');
    expect(
      macroSettingsViolation({ macroEnabled: true, proteinPct: 50, carbsPct: 60, fatPct: -10 }),
    ).toBe('fat_pct must be between 0 and 100');
  });
});
