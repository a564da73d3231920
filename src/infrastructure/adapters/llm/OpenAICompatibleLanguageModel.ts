import OpenAI, { APIConnectionTimeoutError, APIUserAbortError } from 'openai';
import type { CompletionOptions, LanguageModelPort, ProviderStatus } from '../../../application/ports/LanguageModelPort.js';
import { ServiceUnavailableError } from '../../../domain/errors/FinancialQueryErrors.js';
import type { LlmProviderConfig } from '../../config/Config.js';

export class OpenAICompatibleLanguageModel implements LanguageModelPort {
  readonly provider: string;
  readonly model: string;
  private readonly client: OpenAI;

  constructor(config: Pick<LlmProviderConfig, 'name' | 'model' | 'apiKey' | 'baseURL'>, client?: OpenAI) {
    this.provider = config.name;
    this.model = config.model;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        maxRetries: 0,
      });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: 0.7,
          max_tokens: 500,
        },
        { timeout: options.timeoutMs, signal: options.signal, maxRetries: 0 },
      );

      const content = response.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new ServiceUnavailableError(`${this.provider} returned an empty response`);
      }

      return content;
    } catch (error) {
      if (error instanceof ServiceUnavailableError) {
        throw error;
      }
      if (error instanceof APIConnectionTimeoutError || error instanceof APIUserAbortError) {
        throw new ServiceUnavailableError(`${this.provider} timed out`, 'timeout');
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ServiceUnavailableError(`${this.provider} failed: ${message}`);
    }
  }

  async status(): Promise<ProviderStatus[]> {
    try {
      await this.complete('Hello', { timeoutMs: 10_000 });
      return [{ provider: this.provider, model: this.model, status: 'AVAILABLE' }];
    } catch (error) {
      const detail = error instanceof Error ? error.message.slice(0, 80) : undefined;
      return [{ provider: this.provider, model: this.model, status: 'UNAVAILABLE', detail }];
    }
  }
}
