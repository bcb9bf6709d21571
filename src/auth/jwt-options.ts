import { JwtModuleOptions } from '@nestjs/jwt';
import { AuthConfig } from '../config/configuration';

/** Signing and verification share one algorithm; tokens signed any other way are refused. */
export function jwtModuleOptions(auth: AuthConfig): JwtModuleOptions {
  return {
    secret: auth.jwtSecret,
    signOptions: {
      algorithm: auth.jwtAlgorithm,
      expiresIn: `${auth.accessTokenExpireMinutes}m`,
    },
    verifyOptions: { algorithms: [auth.jwtAlgorithm] },
  };
}
