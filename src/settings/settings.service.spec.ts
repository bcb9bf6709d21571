import { BadRequestException } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { Model } from 'mongoose';
import { createModelMock, mockQuery, ModelMock } from '../testing/mongoose-mocks';
import { UpdateSettingsDto } from './dto/update-settings.dto';
import { UserSettings } from './schemas/user-settings.schema';
import { SettingsService } from './settings.service';

const USER = 'user-a';

describe('SettingsService', () => {
  let model: ModelMock;
  let service: SettingsService;

  beforeEach(() => {
    model = createModelMock();
    service = new SettingsService(model as unknown as Model<UserSettings>);
  });

  describe('get', () => {
    it('returns defaults without creating a row', async () => {
      await expect(service.get(USER)).resolves.toEqual({
        macro_enabled: false,
        protein_pct: null,
        carbs_pct: null,
        fat_pct: null,
      });
      expect(model.findOne).toHaveBeenCalledWith({ userId: USER });
      expect(model.findOneAndUpdate).not.toHaveBeenCalled();
      expect(model.create).not.toHaveBeenCalled();
    });

    it('returns stored values', async () => {
      model.findOne.mockReturnValue(
        mockQuery({ macroEnabled: true, proteinPct: 25, carbsPct: 50, fatPct: 25 }),
      );

      await expect(service.get(USER)).resolves.toEqual({
        macro_enabled: true,
        protein_pct: 25,
        carbs_pct: 50,
        fat_pct: 25,
      });
    });
  });

  describe('getMacroTargets', () => {
    it('is null when nothing was saved', async () => {
      await expect(service.getMacroTargets(USER)).resolves.toBeNull();
    });

    it('maps the stored row', async () => {
      model.findOne.mockReturnValue(
        mockQuery({ macroEnabled: true, proteinPct: 30, carbsPct: 40, fatPct: 30 }),
      );

      await expect(service.getMacroTargets(USER)).resolves.toEqual({
        macroEnabled: true,
        proteinPct: 30,
        carbsPct: 40,
        fatPct: 30,
      });
    });
  });

  describe('update', () => {
    it('upserts the full document', async () => {
      model.findOneAndUpdate.mockReturnValue(
        mockQuery({ macroEnabled: true, proteinPct: 30, carbsPct: 30, fatPct: 40 }),
      );

      const view = await service.update(USER, {
        macro_enabled: true,
        protein_pct: 30,
        carbs_pct: 30,
        fat_pct: 40,
      });

      expect(view).toEqual({ macro_enabled: true, protein_pct: 30, carbs_pct: 30, fat_pct: 40 });
      expect(model.findOneAndUpdate).toHaveBeenCalledWith(
        { userId: USER },
        {
          $set: { macroEnabled: true, proteinPct: 30, carbsPct: 30, fatPct: 40 },
          $setOnInsert: { userId: USER },
        },
        { new: true, upsert: true, setDefaultsOnInsert: true },
      );
    });

    it('clears percentages left out of the body', async () => {
      model.findOneAndUpdate.mockReturnValue(
        mockQuery({ macroEnabled: false, proteinPct: null, carbsPct: null, fatPct: null }),
      );

      await service.update(USER, { macro_enabled: false });

      expect(model.findOneAndUpdate).toHaveBeenCalledWith(
        { userId: USER },
        {
          $set: { macroEnabled: false, proteinPct: null, carbsPct: null, fatPct: null },
          $setOnInsert: { userId: USER },
        },
        { new: true, upsert: true, setDefaultsOnInsert: true },
      );
    });

    it('rejects a 30/30/30 split without writing', async () => {
      const attempt = service.update(USER, {
        macro_enabled: true,
        protein_pct: 30,
        carbs_pct: 30,
        fat_pct: 30,
      });

      await expect(attempt).rejects.toBeInstanceOf(BadRequestException);
      await expect(attempt).rejects.toThrow('Macro percentages must sum to 100 (got 90)');
      expect(model.findOneAndUpdate).not.toHaveBeenCalled();
    });
  });

  it('deletes the row inside the given session', async () => {
    const query = mockQuery({ deletedCount: 1 });
    model.deleteOne.mockReturnValue(query);

    await service.deleteForUser(USER, null);

    expect(model.deleteOne).toHaveBeenCalledWith({ userId: USER });
    expect(query.session).toHaveBeenCalledWith(null);
  });
});

describe('UpdateSettingsDto', () => {
  it('requires macro_enabled to be a boolean', async () => {
    const dto = plainToInstance(UpdateSettingsDto, { macro_enabled: 'yes' });

    const errors = await validate(dto);

    expect(errors.map((e) => e.property)).toEqual(['macro_enabled']);
  });

  it('rejects percentages above 100', async () => {
    const dto = plainToInstance(UpdateSettingsDto, { macro_enabled: false, carbs_pct: 150 });

    const errors = await validate(dto);

    expect(errors.map((e) => e.property)).toEqual(['carbs_pct']);
  });

  it('accepts explicit nulls for percentages', async () => {
    const dto = plainToInstance(UpdateSettingsDto, {
      macro_enabled: false,
      protein_pct: null,
      carbs_pct: null,
      fat_pct: null,
    });

    await expect(validate(dto)).resolves.toEqual([]);
  });
});
