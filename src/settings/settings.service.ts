import { BadRequestException, Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { ClientSession, Model } from 'mongoose';
import { MacroTargets } from '../llm/context-assembler';
import { UserSettings } from './schemas/user-settings.schema';
import { UpdateSettingsDto } from './dto/update-settings.dto';
import { macroSettingsViolation } from './macro-validation';

export interface SettingsView {
  macro_enabled: boolean;
  protein_pct: number | null;
  carbs_pct: number | null;
  fat_pct: number | null;
}

const DEFAULT_SETTINGS: SettingsView = {
  macro_enabled: false,
  protein_pct: null,
  carbs_pct: null,
  fat_pct: null,
};

function toView(doc: UserSettings): SettingsView {
  return {
    macro_enabled: doc.macroEnabled,
    protein_pct: doc.proteinPct ?? null,
    carbs_pct: doc.carbsPct ?? null,
    fat_pct: doc.fatPct ?? null,
  };
}

@Injectable()
export class SettingsService {
  constructor(
    @InjectModel(UserSettings.name) private readonly settingsModel: Model<UserSettings>,
  ) {}

  /** Defaults when the user never saved settings; reading never creates the row. */
  async get(userId: string): Promise<SettingsView> {
    const doc = await this.settingsModel.findOne({ userId }).exec();
    return doc ? toView(doc) : { ...DEFAULT_SETTINGS };
  }

  /** Macro targets for the context assembler, or null when no settings row exists. */
  async getMacroTargets(userId: string): Promise<MacroTargets | null> {
    const doc = await this.settingsModel.findOne({ userId }).exec();
    if (!doc) return null;
    return {
      macroEnabled: doc.macroEnabled,
      proteinPct: doc.proteinPct ?? null,
      carbsPct: doc.carbsPct ?? null,
      fatPct: doc.fatPct ?? null,
    };
  }

  async update(userId: string, dto: UpdateSettingsDto): Promise<SettingsView> {
    const values = {
      macroEnabled: dto.macro_enabled,
      proteinPct: dto.protein_pct ?? null,
      carbsPct: dto.carbs_pct ?? null,
      fatPct: dto.fat_pct ?? null,
    };
    const violation = macroSettingsViolation(values);
    if (violation) throw new BadRequestException(violation);

    const doc = await this.settingsModel
      .findOneAndUpdate(
        { userId },
        { $set: values, $setOnInsert: { userId } },
        { new: true, upsert: true, setDefaultsOnInsert: true },
      )
      .exec();
    return toView(doc);
  }

  /** Part of the account-deletion cascade. */
  async deleteForUser(userId: string, session: ClientSession | null): Promise<void> {
    await this.settingsModel.deleteOne({ userId }).session(session).exec();
  }
}
