import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import configuration from './config/configuration';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './common/database/database.module';
import { MongoExceptionFilter } from './common/filters/mongo-exception.filter';
import { AppController } from './app.controller';
import { AuthModule } from './auth/auth.module';
import { ChatsModule } from './chats/chats.module';
import { IngredientsModule } from './ingredients/ingredients.module';
import { SettingsModule } from './settings/settings.module';
import { LlmModule } from './llm/llm.module';

@Module({
  controllers: [AppController],
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [configuration], validate: validateEnv }),
    DatabaseModule,
    AuthModule,
    ChatsModule,
    IngredientsModule,
    SettingsModule,
    LlmModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: MongoExceptionFilter }],
})
export class AppModule {}
