import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model } from 'mongoose';
import * as bcrypt from 'bcrypt';
import { createHash, randomBytes } from 'node:crypto';
import { AppConfig, AuthConfig } from '../config/configuration';
import { TransactionService } from '../common/database/transaction.service';
import { ChatsService } from '../chats/chats.service';
import { IngredientsService } from '../ingredients/ingredients.service';
import { SettingsService } from '../settings/settings.service';
import { User } from './schemas/user.schema';
import { assertPasswordPolicy } from './password-policy';
import { RegisterDto } from './dto/register.dto';
import { UpdateProfileDto } from './dto/profile.dto';

const BCRYPT_ROUNDS = 10;
export const RESET_TOKEN_TTL_MS = 24 * 60 * 60 * 1000;
export const RESET_REQUESTED_MESSAGE =
  'If an account with that email exists, a password reset link has been sent.';

export interface UserProfile {
  id: string;
  email: string;
  username: string;
  full_name: string | null;
  is_active: boolean;
  is_verified: boolean;
  created_at: Date | null;
}

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
}

export interface JwtPayload {
  sub: string;
  username: string;
}

export function toProfile(user: User): UserProfile {
  return {
    id: String(user._id),
    email: user.email,
    username: user.username,
    full_name: user.fullName ?? null,
    is_active: user.isActive,
    is_verified: user.isVerified,
    created_at: user.createdAt ?? null,
  };
}

export function hashResetToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Credential store and account lifecycle: bcrypt password hashes, signed JWT access
 * tokens, single-use reset tokens, and the account-deletion cascade.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private readonly auth: AuthConfig;

  constructor(
    @InjectModel(User.name) private readonly userModel: Model<User>,
    private readonly jwtService: JwtService,
    private readonly transactions: TransactionService,
    private readonly chatsService: ChatsService,
    private readonly ingredientsService: IngredientsService,
    private readonly settingsService: SettingsService,
    config: ConfigService<AppConfig, true>,
  ) {
    this.auth = config.get('auth', { infer: true });
  }

  hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, BCRYPT_ROUNDS);
  }

  verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  issueToken(user: User): AccessToken {
    const payload: JwtPayload = { sub: String(user._id), username: user.username };
    return { access_token: this.jwtService.sign(payload), token_type: 'bearer' };
  }

  private async assertAvailable(
    email: string | undefined,
    username: string | undefined,
    exceptUserId?: string,
  ): Promise<void> {
    const notSelf = exceptUserId ? { _id: { $ne: exceptUserId } } : {};
    if (email && (await this.userModel.exists({ email: email.toLowerCase(), ...notSelf }).exec())) {
      throw new ConflictException('Email already registered');
    }
    if (username && (await this.userModel.exists({ username, ...notSelf }).exec())) {
      throw new ConflictException('Username already taken');
    }
  }

  async register(dto: RegisterDto): Promise<UserProfile> {
    assertPasswordPolicy(dto.password);
    await this.assertAvailable(dto.email, dto.username);
    const user = await this.userModel.create({
      email: dto.email.toLowerCase(),
      username: dto.username,
      passwordHash: await this.hashPassword(dto.password),
      fullName: dto.full_name || null,
    });
    this.logger.log(`registered user ${user.username}`);
    return toProfile(user);
  }

  /** Identifier is a username or an email; a value containing "@" is tried as an email first. */
  private async findByIdentifier(identifier: string): Promise<User | null> {
    const byEmail = () => this.userModel.findOne({ email: identifier.toLowerCase() }).exec();
    const byUsername = () => this.userModel.findOne({ username: identifier }).exec();
    if (identifier.includes('@')) {
      return (await byEmail()) ?? (await byUsername());
    }
    return (await byUsername()) ?? (await byEmail());
  }

  async login(identifier: string, password: string): Promise<AccessToken> {
    const user = await this.findByIdentifier(identifier.trim());
    if (!user || !(await this.verifyPassword(password, user.passwordHash))) {
      this.logger.warn(`failed login for "${identifier}"`);
      throw new UnauthorizedException('Incorrect username or password');
    }
    if (!user.isActive) {
      this.logger.warn(`login attempt on inactive account ${user.username}`);
      throw new UnauthorizedException('Inactive user');
    }
    return this.issueToken(user);
  }

  /** Token subject lookup for JwtStrategy: null when the user is gone or deactivated. */
  async findActiveUser(userId: string): Promise<User | null> {
    if (!isValidObjectId(userId)) return null;
    const user = await this.userModel.findById(userId).exec();
    return user && user.isActive ? user : null;
  }

  private async requireUser(userId: string): Promise<User> {
    const user = await this.findActiveUser(userId);
    if (!user) throw new UnauthorizedException('User not found');
    return user;
  }

  async getMe(userId: string): Promise<UserProfile> {
    return toProfile(await this.requireUser(userId));
  }

  async updateProfile(userId: string, dto: UpdateProfileDto): Promise<UserProfile> {
    await this.requireUser(userId);
    await this.assertAvailable(dto.email, dto.username, userId);
    const $set: Partial<Pick<User, 'email' | 'username' | 'fullName'>> = {};
    if (dto.email !== undefined) $set.email = dto.email.toLowerCase();
    if (dto.username !== undefined) $set.username = dto.username;
    if (dto.full_name !== undefined) $set.fullName = dto.full_name || null;
    const user = await this.userModel.findByIdAndUpdate(userId, { $set }, { new: true }).exec();
    if (!user) throw new UnauthorizedException('User not found');
    return toProfile(user);
  }

  async changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
    const user = await this.requireUser(userId);
    if (!(await this.verifyPassword(currentPassword, user.passwordHash))) {
      throw new UnauthorizedException('Incorrect current password');
    }
    assertPasswordPolicy(newPassword);
    await this.userModel
      .updateOne(
        { _id: user._id },
        {
          $set: {
            passwordHash: await this.hashPassword(newPassword),
            resetTokenHash: null,
            resetTokenExpiresAt: null,
          },
        },
      )
      .exec();
  }

  /**
   * Issues a reset token for an active account. The caller always gets the same message;
   * the raw token is only returned when EXPOSE_RESET_TOKEN is on.
   */
  async requestPasswordReset(email: string): Promise<{ message: string; reset_token?: string }> {
    const user = await this.userModel
      .findOne({ email: email.trim().toLowerCase(), isActive: true })
      .exec();
    if (!user) return { message: RESET_REQUESTED_MESSAGE };

    const token = randomBytes(32).toString('hex');
    await this.userModel
      .updateOne(
        { _id: user._id },
        {
          $set: {
            resetTokenHash: hashResetToken(token),
            resetTokenExpiresAt: new Date(Date.now() + RESET_TOKEN_TTL_MS),
          },
        },
      )
      .exec();
    this.logger.log(`password reset requested for ${user.username}`);
    this.logger.debug(`reset token for ${user.username}: ${token}`);
    return this.auth.exposeResetToken
      ? { message: RESET_REQUESTED_MESSAGE, reset_token: token }
      : { message: RESET_REQUESTED_MESSAGE };
  }

  /** Checks a reset token without consuming it. */
  async verifyResetToken(token: string): Promise<boolean> {
    const user = await this.userModel
      .findOne({
        resetTokenHash: hashResetToken(token),
        resetTokenExpiresAt: { $gt: new Date() },
        isActive: true,
      })
      .exec();
    return user !== null;
  }

  /** Consumes the token: the matching update clears it, so a second use finds nothing. */
  async resetPassword(token: string, newPassword: string): Promise<void> {
    assertPasswordPolicy(newPassword);
    const passwordHash = await this.hashPassword(newPassword);
    const user = await this.userModel
      .findOneAndUpdate(
        {
          resetTokenHash: hashResetToken(token),
          resetTokenExpiresAt: { $gt: new Date() },
          isActive: true,
        },
        { $set: { passwordHash, resetTokenHash: null, resetTokenExpiresAt: null } },
        { new: true },
      )
      .exec();
    if (!user) throw new BadRequestException('Invalid or expired reset token');
    this.logger.log(`password reset completed for ${user.username}`);
  }

  /** Removes the user and everything they own in one transaction. */
  async deleteAccount(userId: string): Promise<void> {
    const user = await this.requireUser(userId);
    const id = String(user._id);
    await this.transactions.run(async (session) => {
      await this.chatsService.deleteAllForUser(id, session);
      await this.ingredientsService.deleteAllForUser(id, session);
      await this.settingsService.deleteForUser(id, session);
      await this.userModel.deleteOne({ _id: user._id }).session(session).exec();
    });
    this.logger.log(`deleted account ${user.username}`);
  }

  /**
   * Make sure an account exists, is active and verified. The password is only written when
   * the account is created or when `resetPassword` is set.
   */
  async ensureUser(
    username: string,
    email: string,
    password: string,
    options: { resetPassword?: boolean } = {},
  ): Promise<{ created: boolean }> {
    const existing = await this.userModel.findOne({ username }).exec();
    if (!existing) {
      assertPasswordPolicy(password);
      await this.assertAvailable(email, undefined);
      await this.userModel.create({
        email: email.toLowerCase(),
        username,
        passwordHash: await this.hashPassword(password),
        fullName: null,
        isActive: true,
        isVerified: true,
      });
      return { created: true };
    }
    const $set: Partial<Pick<User, 'isActive' | 'isVerified' | 'passwordHash'>> = {
      isActive: true,
      isVerified: true,
    };
    if (options.resetPassword) {
      assertPasswordPolicy(password);
      $set.passwordHash = await this.hashPassword(password);
    }
    await this.userModel.updateOne({ _id: existing._id }, { $set }).exec();
    return { created: false };
  }
}
