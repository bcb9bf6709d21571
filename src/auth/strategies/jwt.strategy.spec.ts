import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { AppConfig, AuthConfig } from '../../config/configuration';
import { AuthService } from '../auth.service';
import { jwtModuleOptions } from '../jwt-options';
import { JwtStrategy } from './jwt.strategy';

const USER_ID = '64b0000000000000000000aa';

const authConfig: AuthConfig = {
  jwtSecret: 'test-secret',
  jwtAlgorithm: 'HS256',
  accessTokenExpireMinutes: 60,
  exposeResetToken: false,
};

describe('access tokens', () => {
  const jwt = new JwtService(jwtModuleOptions(authConfig));

  afterEach(() => {
    jest.useRealTimers();
  });

  it('verifies a freshly issued token', () => {
    const token = jwt.sign({ sub: USER_ID, username: 'alex' });

    expect(jwt.verify(token)).toEqual(
      expect.objectContaining({ sub: USER_ID, username: 'alex' }),
    );
  });

  it('expires after the configured number of minutes', () => {
    jest.useFakeTimers({ now: new Date('2026-05-01T12:00:00Z') });
    const token = jwt.sign({ sub: USER_ID, username: 'alex' });

    jest.setSystemTime(new Date('2026-05-01T12:59:00Z'));
    expect(() => jwt.verify(token)).not.toThrow();

    jest.setSystemTime(new Date('2026-05-01T13:01:00Z'));
    expect(() => jwt.verify(token)).toThrow('jwt expired');
  });

  it('rejects a token signed with a different algorithm', () => {
    const other = new JwtService(jwtModuleOptions({ ...authConfig, jwtAlgorithm: 'HS512' }));
    const token = other.sign({ sub: USER_ID, username: 'alex' });

    expect(() => jwt.verify(token)).toThrow('invalid algorithm');
  });

  it('rejects a token signed with a different secret', () => {
    const other = new JwtService(jwtModuleOptions({ ...authConfig, jwtSecret: 'other-secret' }));
    const token = other.sign({ sub: USER_ID, username: 'alex' });

    expect(() => jwt.verify(token)).toThrow('invalid signature');
  });
});

describe('JwtStrategy', () => {
  let authService: { findActiveUser: jest.Mock };
  let strategy: JwtStrategy;

  beforeEach(() => {
    authService = { findActiveUser: jest.fn() };
    const config = { get: jest.fn(() => authConfig) };
    strategy = new JwtStrategy(
      config as unknown as ConfigService<AppConfig, true>,
      authService as unknown as AuthService,
    );
  });

  it('resolves the subject to the request user', async () => {
    authService.findActiveUser.mockResolvedValue({ _id: USER_ID, username: 'alex' });

    await expect(strategy.validate({ sub: USER_ID, username: 'alex' })).resolves.toEqual({
      userId: USER_ID,
      username: 'alex',
    });
    expect(authService.findActiveUser).toHaveBeenCalledWith(USER_ID);
  });

  it('refuses a subject that is unknown or deactivated', async () => {
    authService.findActiveUser.mockResolvedValue(null);

    await expect(strategy.validate({ sub: USER_ID, username: 'alex' })).rejects.toThrow(
      new UnauthorizedException('Invalid or expired token'),
    );
  });
});
