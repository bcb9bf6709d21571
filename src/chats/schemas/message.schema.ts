import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

export const MESSAGE_ROLES = ['system', 'user', 'assistant'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

/** One turn of a chat session. Never updated after insert. */
@Schema({ timestamps: { createdAt: true, updatedAt: false }, collection: 'messages' })
export class Message extends Document {
  @Prop({ required: true, index: true })
  chatId!: string;

  @Prop({ type: String, enum: MESSAGE_ROLES, required: true })
  role!: MessageRole;

  @Prop({ required: true })
  content!: string;

  @Prop()
  createdAt?: Date;
}

export const MessageSchema = SchemaFactory.createForClass(Message);
MessageSchema.index({ chatId: 1, createdAt: 1, _id: 1 });
