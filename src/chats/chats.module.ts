import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ChatSession, ChatSessionSchema } from './schemas/chat-session.schema';
import { Message, MessageSchema } from './schemas/message.schema';
import { ChatsController } from './chats.controller';
import { ChatsService } from './chats.service';
import { IngredientsModule } from '../ingredients/ingredients.module';
import { SettingsModule } from '../settings/settings.module';
import { LlmModule } from '../llm/llm.module';

/**
 * Chat sessions with the nutrition assistant.
 * History, ingredients and macro settings are assembled into each model call.
 */
@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ChatSession.name, schema: ChatSessionSchema },
      { name: Message.name, schema: MessageSchema },
    ]),
    IngredientsModule,
    SettingsModule,
    LlmModule,
  ],
  controllers: [ChatsController],
  providers: [ChatsService],
  exports: [ChatsService],
})
export class ChatsModule {}
