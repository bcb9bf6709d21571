/**
 * Force the configured admin account's password to ADMIN_PASSWORD (use when login fails).
 * Run: npm run build && npm run reset-admin
 * Uses MONGODB_URI, ADMIN_USER, ADMIN_EMAIL and ADMIN_PASSWORD from the environment / .env.
 */
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from '../app.module';
import { AppConfig } from '../config/configuration';
import { AuthService } from '../auth/auth.service';

const logger = new Logger('ResetAdmin');

async function resetAdmin() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    const admin = app.get<ConfigService<AppConfig, true>>(ConfigService).get('admin', { infer: true });
    if (!admin) {
      logger.error('ADMIN_USER and ADMIN_PASSWORD must be set');
      process.exitCode = 1;
      return;
    }
    const auth = app.get(AuthService);
    const { created } = await auth.ensureUser(admin.username, admin.email, admin.password, {
      resetPassword: true,
    });
    logger.log(created ? `admin "${admin.username}" created` : `admin "${admin.username}" password reset`);
  } finally {
    await app.close();
  }
}

resetAdmin().catch((e: unknown) => {
  logger.error('reset-admin failed', e instanceof Error ? e.stack : String(e));
  process.exit(1);
});
