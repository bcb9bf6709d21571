import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { AppConfig } from '../config/configuration';
import { User, UserSchema } from './schemas/user.schema';
import { ChatsModule } from '../chats/chats.module';
import { IngredientsModule } from '../ingredients/ingredients.module';
import { SettingsModule } from '../settings/settings.module';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { AdminBootstrapService } from './admin-bootstrap.service';
import { JwtStrategy } from './strategies/jwt.strategy';
import { jwtModuleOptions } from './jwt-options';

@Module({
  imports: [
    ChatsModule,
    IngredientsModule,
    SettingsModule,
    MongooseModule.forFeature([{ name: User.name, schema: UserSchema }]),
    PassportModule.register({ defaultStrategy: 'jwt' }),
    JwtModule.registerAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService<AppConfig, true>) =>
        jwtModuleOptions(config.get('auth', { infer: true })),
      inject: [ConfigService],
    }),
  ],
  controllers: [AuthController],
  providers: [AuthService, JwtStrategy, AdminBootstrapService],
  exports: [AuthService],
})
export class AuthModule {}
