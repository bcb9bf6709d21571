import { BadRequestException } from '@nestjs/common';
import { parseIngredientCsv, serializeIngredientCsv } from './ingredients-csv';

const HEADER = 'name,calories_per_gram,protein_per_gram,fat_per_gram,carbs_per_gram';

describe('parseIngredientCsv', () => {
  it('parses every row into per-gram values', () => {
    const rows = parseIngredientCsv(
      `${HEADER}\nOats,3.89,0.169,0.069,0.663\nEgg, 1.43 ,0.126,0.095,0.007\n`,
    );

    expect(rows).toEqual([
      { name: 'Oats', caloriesPerGram: 3.89, proteinPerGram: 0.169, fatPerGram: 0.069, carbsPerGram: 0.663 },
      { name: 'Egg', caloriesPerGram: 1.43, proteinPerGram: 0.126, fatPerGram: 0.095, carbsPerGram: 0.007 },
    ]);
  });

  it('accepts columns in any order, extra columns and a BOM', () => {
    const rows = parseIngredientCsv(
      '\uFEFFcarbs_per_gram,name,notes,fat_per_gram,protein_per_gram,calories_per_gram\n' +
        '0.28,"Rice, white",staple,0.003,0.027,1.3\n',
    );

    expect(rows).toEqual([
      { name: 'Rice, white', caloriesPerGram: 1.3, proteinPerGram: 0.027, fatPerGram: 0.003, carbsPerGram: 0.28 },
    ]);
  });

  it('returns no rows for a header-only file', () => {
    expect(parseIngredientCsv(`${HEADER}\n`)).toEqual([]);
  });

  it('rejects a file missing a required column', () => {
    expect(() => parseIngredientCsv('name,calories_per_gram,protein_per_gram,fat_per_gram\nOats,1,1,1\n')).toThrow(
      'CSV must contain columns: name, calories_per_gram, protein_per_gram, fat_per_gram, carbs_per_gram (missing: carbs_per_gram)',
    );
  });

  it('rejects an empty file', () => {
    expect(() => parseIngredientCsv('')).toThrow(BadRequestException);
  });

  it('rejects a non-numeric value and names the line and column', () => {
    expect(() =>
      parseIngredientCsv(`${HEADER}\nOats,3.89,0.169,0.069,0.663\nEgg,lots,0.126,0.095,0.007\n`),
    ).toThrow('Line 3: invalid value "lots" for calories_per_gram');
  });

  it('rejects negative values', () => {
    expect(() => parseIngredientCsv(`${HEADER}\nOats,3.89,-0.1,0.069,0.663\n`)).toThrow(
      'Line 2: protein_per_gram must not be negative',
    );
  });

  it('rejects a missing cell and a blank name', () => {
    expect(() => parseIngredientCsv(`${HEADER}\nOats,3.89,0.169,0.069\n`)).toThrow(
      'Line 2: invalid value "" for carbs_per_gram',
    );
    expect(() => parseIngredientCsv(`${HEADER}\n  ,1,1,1,1\n`)).toThrow('Line 2: name is required');
  });

  it('reports the line in the file, counting skipped blank lines', () => {
    expect(() =>
      parseIngredientCsv(`${HEADER}\n\nOats,1,1,1,1\n\nEgg,1,x,1,1\n`),
    ).toThrow('Line 5: invalid value "x" for protein_per_gram');
  });

  it('accepts names up to 255 characters and rejects longer ones', () => {
    const longest = 'a'.repeat(255);

    expect(parseIngredientCsv(`${HEADER}\n${longest},1,1,1,1\n`)[0].name).toBe(longest);
    expect(() => parseIngredientCsv(`${HEADER}\nOats,1,1,1,1\n${longest}b,1,1,1,1\n`)).toThrow(
      'Line 3: name must be at most 255 characters',
    );
  });

  it('rejects duplicate names within one file', () => {
    expect(() => parseIngredientCsv(`${HEADER}\nOats,1,1,1,1\nOats,2,2,2,2\n`)).toThrow(
      'Line 3: duplicate ingredient "Oats"',
    );
  });
});

describe('serializeIngredientCsv', () => {
  it('writes the header and one line per ingredient in column order', () => {
    const csv = serializeIngredientCsv([
      { name: 'Oats', caloriesPerGram: 3.89, proteinPerGram: 0.169, fatPerGram: 0.069, carbsPerGram: 0.663 },
      { name: 'Rice, white', caloriesPerGram: 1.3, proteinPerGram: 0.027, fatPerGram: 0.003, carbsPerGram: 0.28 },
    ]);

    expect(csv).toBe(
      `${HEADER}\nOats,3.89,0.169,0.069,0.663\n"Rice, white",1.3,0.027,0.003,0.28\n`,
    );
  });

  it('parses back to the same values', () => {
    const rows = [
      { name: 'Lentils', caloriesPerGram: 1.16, proteinPerGram: 0.09, fatPerGram: 0.004, carbsPerGram: 0.2 },
    ];

    expect(parseIngredientCsv(serializeIngredientCsv(rows))).toEqual(rows);
  });
});
