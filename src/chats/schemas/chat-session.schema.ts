import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

export const DEFAULT_CHAT_TITLE = 'New Chat';

@Schema({ timestamps: true, collection: 'chat_sessions' })
export class ChatSession extends Document {
  @Prop({ required: true, index: true })
  userId!: string;

  @Prop({ default: DEFAULT_CHAT_TITLE, maxlength: 255 })
  title!: string;

  @Prop()
  createdAt?: Date;

  /** Bumped whenever a message is appended. */
  @Prop()
  updatedAt?: Date;
}

export const ChatSessionSchema = SchemaFactory.createForClass(ChatSession);
ChatSessionSchema.index({ userId: 1, updatedAt: -1 });
