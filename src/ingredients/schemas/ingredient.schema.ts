import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

export const INGREDIENT_NAME_MAX_LENGTH = 255;

/** Nutrition values are per gram. */
@Schema({ timestamps: { createdAt: true, updatedAt: false }, collection: 'ingredients' })
export class Ingredient extends Document {
  @Prop({ required: true, index: true })
  userId!: string;

  @Prop({ required: true, trim: true, maxlength: INGREDIENT_NAME_MAX_LENGTH })
  name!: string;

  @Prop({ required: true, min: 0 })
  caloriesPerGram!: number;

  @Prop({ required: true, min: 0 })
  proteinPerGram!: number;

  @Prop({ required: true, min: 0 })
  fatPerGram!: number;

  @Prop({ required: true, min: 0 })
  carbsPerGram!: number;

  @Prop()
  createdAt?: Date;
}

export const IngredientSchema = SchemaFactory.createForClass(Ingredient);
// Unique per user; two users may both have "rice"
IngredientSchema.index({ userId: 1, name: 1 }, { unique: true });
