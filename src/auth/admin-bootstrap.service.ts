import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AdminConfig, AppConfig } from '../config/configuration';
import { AuthService } from './auth.service';

/** Creates the ADMIN_USER account on start-up when it is configured and missing. */
@Injectable()
export class AdminBootstrapService implements OnApplicationBootstrap {
  private readonly logger = new Logger(AdminBootstrapService.name);
  private readonly admin: AdminConfig | null;

  constructor(
    private readonly authService: AuthService,
    config: ConfigService<AppConfig, true>,
  ) {
    this.admin = config.get('admin', { infer: true });
  }

  async onApplicationBootstrap(): Promise<void> {
    if (!this.admin) return;
    const { username, email, password } = this.admin;
    const { created } = await this.authService.ensureUser(username, email, password);
    if (created) {
      this.logger.log(`created bootstrap admin account "${username}"`);
    } else {
      this.logger.log(`bootstrap admin account "${username}" already exists`);
    }
  }
}
