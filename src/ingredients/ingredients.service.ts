import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { ClientSession, Model } from 'mongoose';
import { TransactionService, withSession } from '../common/database/transaction.service';
import { IngredientFacts } from '../llm/context-assembler';
import { Ingredient } from './schemas/ingredient.schema';
import { parseIngredientCsv, serializeIngredientCsv } from './ingredients-csv';

export interface IngredientView {
  id: string;
  name: string;
  calories_per_gram: number;
  protein_per_gram: number;
  fat_per_gram: number;
  carbs_per_gram: number;
  created_at: Date | null;
}

function toView(doc: Ingredient): IngredientView {
  return {
    id: String(doc._id),
    name: doc.name,
    calories_per_gram: doc.caloriesPerGram,
    protein_per_gram: doc.proteinPerGram,
    fat_per_gram: doc.fatPerGram,
    carbs_per_gram: doc.carbsPerGram,
    created_at: doc.createdAt ?? null,
  };
}

function toFacts(doc: Ingredient): IngredientFacts {
  return {
    name: doc.name,
    caloriesPerGram: doc.caloriesPerGram,
    proteinPerGram: doc.proteinPerGram,
    fatPerGram: doc.fatPerGram,
    carbsPerGram: doc.carbsPerGram,
  };
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Per-user ingredient nutrition table. Uploads replace the whole table. */
@Injectable()
export class IngredientsService {
  private readonly logger = new Logger(IngredientsService.name);

  constructor(
    @InjectModel(Ingredient.name) private readonly ingredientModel: Model<Ingredient>,
    private readonly transactions: TransactionService,
  ) {}

  private async findAll(userId: string): Promise<Ingredient[]> {
    return this.ingredientModel.find({ userId }).sort({ name: 1 }).exec();
  }

  async list(userId: string): Promise<IngredientView[]> {
    return (await this.findAll(userId)).map(toView);
  }

  /** Ingredient data in the shape the context assembler consumes. */
  async listFacts(userId: string): Promise<IngredientFacts[]> {
    return (await this.findAll(userId)).map(toFacts);
  }

  async count(userId: string): Promise<number> {
    return this.ingredientModel.countDocuments({ userId }).exec();
  }

  /** Delete-then-insert in one transaction; returns the number of rows now stored. */
  async replaceAll(userId: string, rows: IngredientFacts[]): Promise<number> {
    await this.transactions.run(async (session) => {
      await this.ingredientModel.deleteMany({ userId }).session(session).exec();
      if (rows.length > 0) {
        await this.ingredientModel.insertMany(
          rows.map((r) => ({ ...r, userId })),
          withSession(session),
        );
      }
    });
    return rows.length;
  }

  async clear(userId: string): Promise<number> {
    const result = await this.deleteAllForUser(userId, null);
    this.logger.log(`cleared ${result} ingredients for user ${userId}`);
    return result;
  }

  /** Part of the account-deletion cascade. */
  async deleteAllForUser(userId: string, session: ClientSession | null): Promise<number> {
    const result = await this.ingredientModel.deleteMany({ userId }).session(session).exec();
    return result.deletedCount;
  }

  /** Validate the whole file first; the table is only touched when every row parses. */
  async importCsv(userId: string, fileName: string, content: Buffer): Promise<number> {
    if (!fileName.toLowerCase().endsWith('.csv')) {
      throw new BadRequestException('File must be a CSV');
    }
    let text: string;
    try {
      text = utf8.decode(content);
    } catch {
      throw new BadRequestException('File encoding error. Please use UTF-8 encoded CSV');
    }
    let rows: IngredientFacts[];
    try {
      rows = parseIngredientCsv(text);
    } catch (err) {
      this.logger.warn(
        `rejected ingredient upload for user ${userId}: ${err instanceof Error ? err.message : err}`,
      );
      throw err;
    }
    const count = await this.replaceAll(userId, rows);
    this.logger.log(`user ${userId} uploaded ${count} ingredients`);
    return count;
  }

  async exportCsv(userId: string): Promise<string> {
    return serializeIngredientCsv(await this.listFacts(userId));
  }
}
