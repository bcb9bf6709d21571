import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

@Schema({ timestamps: true, collection: 'user_settings' })
export class UserSettings extends Document {
  @Prop({ required: true, unique: true })
  userId!: string;

  @Prop({ default: false })
  macroEnabled!: boolean;

  @Prop({ type: Number, default: null, min: 0, max: 100 })
  proteinPct!: number | null;

  @Prop({ type: Number, default: null, min: 0, max: 100 })
  carbsPct!: number | null;

  @Prop({ type: Number, default: null, min: 0, max: 100 })
  fatPct!: number | null;

  @Prop()
  updatedAt?: Date;
}

export const UserSettingsSchema = SchemaFactory.createForClass(UserSettings);
