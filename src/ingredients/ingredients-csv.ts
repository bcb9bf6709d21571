import { BadRequestException } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { IngredientFacts } from '../llm/context-assembler';
import { INGREDIENT_NAME_MAX_LENGTH } from './schemas/ingredient.schema';

/** Column order for both import and export. */
export const CSV_COLUMNS = [
  'name',
  'calories_per_gram',
  'protein_per_gram',
  'fat_per_gram',
  'carbs_per_gram',
] as const;

type NutrientColumn = Exclude<(typeof CSV_COLUMNS)[number], 'name'>;

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** One parsed record and the source line it ends on. */
interface CsvLine {
  cells: string[];
  line: number;
}

function toCsvLine(entry: unknown): CsvLine {
  if (typeof entry !== 'object' || entry === null || !('record' in entry) || !('info' in entry)) {
    return { cells: [], line: 0 };
  }
  const { record, info } = entry;
  const cells = Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? '')) : [];
  const line =
    typeof info === 'object' && info !== null && 'lines' in info && typeof info.lines === 'number'
      ? info.lines
      : 0;
  return { cells, line };
}

function parseNutrient(raw: string, column: NutrientColumn, line: number): number {
  const value = raw.trim();
  if (!NUMBER_PATTERN.test(value)) {
    throw new BadRequestException(`Line ${line}: invalid value "${raw}" for ${column}`);
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new BadRequestException(`Line ${line}: invalid value "${raw}" for ${column}`);
  }
  if (n < 0) {
    throw new BadRequestException(`Line ${line}: ${column} must not be negative`);
  }
  return n;
}

/**
 * Parse and validate an ingredient CSV. Throws BadRequestException on the first problem,
 * so callers write nothing unless every row is valid. Extra columns are ignored.
 */
export function parseIngredientCsv(text: string): IngredientFacts[] {
  let rows: CsvLine[];
  try {
    const parsed: unknown = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      info: true,
    });
    rows = Array.isArray(parsed) ? parsed.map(toCsvLine) : [];
  } catch (err) {
    throw new BadRequestException(
      `Malformed CSV: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (rows.length === 0) {
    throw new BadRequestException(`CSV must contain columns: ${CSV_COLUMNS.join(', ')}`);
  }

  const header = rows[0].cells.map((h) => h.trim());
  const missing = CSV_COLUMNS.filter((c) => !header.includes(c));
  if (missing.length > 0) {
    throw new BadRequestException(
      `CSV must contain columns: ${CSV_COLUMNS.join(', ')} (missing: ${missing.join(', ')})`,
    );
  }
  const index = (column: (typeof CSV_COLUMNS)[number]) => header.indexOf(column);

  const seen = new Set<string>();
  return rows.slice(1).map(({ cells, line }) => {
    const cell = (column: (typeof CSV_COLUMNS)[number]) => cells[index(column)] ?? '';
    const name = cell('name').trim();
    if (!name) throw new BadRequestException(`Line ${line}: name is required`);
    if (name.length > INGREDIENT_NAME_MAX_LENGTH) {
      throw new BadRequestException(
        `Line ${line}: name must be at most ${INGREDIENT_NAME_MAX_LENGTH} characters`,
      );
    }
    if (seen.has(name)) throw new BadRequestException(`Line ${line}: duplicate ingredient "${name}"`);
    seen.add(name);
    return {
      name,
      caloriesPerGram: parseNutrient(cell('calories_per_gram'), 'calories_per_gram', line),
      proteinPerGram: parseNutrient(cell('protein_per_gram'), 'protein_per_gram', line),
      fatPerGram: parseNutrient(cell('fat_per_gram'), 'fat_per_gram', line),
      carbsPerGram: parseNutrient(cell('carbs_per_gram'), 'carbs_per_gram', line),
    };
  });
}

export function serializeIngredientCsv(ingredients: IngredientFacts[]): string {
  return stringify(
    ingredients.map((i) => [
      i.name,
      i.caloriesPerGram,
      i.proteinPerGram,
      i.fatPerGram,
      i.carbsPerGram,
    ]),
    { header: true, columns: [...CSV_COLUMNS] },
  );
}
