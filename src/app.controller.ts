import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from './config/configuration';
import { LlmService } from './llm/llm.service';

@Controller()
export class AppController {
  constructor(
    private readonly config: ConfigService<AppConfig, true>,
    private readonly llmService: LlmService,
  ) {}

  @Get()
  health() {
    return {
      status: 'ok',
      message: this.config.get('appName', { infer: true }),
      docs: '/api/docs',
      auth: '/api/auth/login',
    };
  }

  /** Public model info shown by the UI. */
  @Get('config')
  getConfig() {
    return { model: this.llmService.model, api_base: this.llmService.apiBase };
  }
}
