import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config/configuration';
import { AuthUser } from '../../common/decorators/current-user.decorator';
import { AuthService, JwtPayload } from '../auth.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    config: ConfigService<AppConfig, true>,
    private readonly authService: AuthService,
  ) {
    const auth = config.get('auth', { infer: true });
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: auth.jwtSecret,
      algorithms: [auth.jwtAlgorithm],
    });
  }

  /** Signature and expiry are already checked; the subject must still be an active user. */
  async validate(payload: JwtPayload): Promise<AuthUser> {
    const user = await this.authService.findActiveUser(payload.sub);
    if (!user) throw new UnauthorizedException('Invalid or expired token');
    return { userId: String(user._id), username: user.username };
  }
}
