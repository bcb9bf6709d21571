import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { AppConfig, LlmConfig } from '../config/configuration';
import { ChatGatewayException } from './chat-gateway.exception';
import { assembleMessages, ChatTurn, PromptContext } from './context-assembler';

function toMessageParam(turn: ChatTurn): ChatCompletionMessageParam {
  switch (turn.role) {
    case 'system':
      return { role: 'system', content: turn.content };
    case 'assistant':
      return { role: 'assistant', content: turn.content };
    case 'user':
      return { role: 'user', content: turn.content };
  }
}

/**
 * Chat gateway: forwards a conversation to an OpenAI-compatible chat-completions endpoint
 * (Ollama's /v1 by default) and returns the first choice's text.
 */
@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly llm: LlmConfig;
  private readonly client: OpenAI;

  constructor(config: ConfigService<AppConfig, true>) {
    this.llm = config.get('llm', { infer: true });
    this.client = new OpenAI({
      baseURL: this.llm.apiBase,
      // Local Ollama ignores the key, but the SDK requires one
      apiKey: this.llm.apiToken ?? 'not-set',
      timeout: this.llm.timeoutMs,
      maxRetries: this.llm.maxRetries,
    });
  }

  get model(): string {
    return this.llm.model;
  }

  get apiBase(): string {
    return this.llm.apiBase;
  }

  async reply(history: ChatTurn[], newUserMessage: string, context: PromptContext): Promise<string> {
    const messages = assembleMessages(this.llm.systemPrompt, history, newUserMessage, context);
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.llm.model,
        messages: messages.map(toMessageParam),
      });
      content = completion.choices[0]?.message?.content;
    } catch (err) {
      this.logger.error(
        `chat completion failed (model=${this.llm.model})`,
        err instanceof Error ? err.stack : err,
      );
      throw new ChatGatewayException();
    }
    if (content == null) {
      this.logger.error(`chat completion returned no content (model=${this.llm.model})`);
      throw new ChatGatewayException();
    }
    return content;
  }
}
