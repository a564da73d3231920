import { setTimeout as sleep } from 'node:timers/promises';
import type { CompletionOptions, LanguageModelPort, ProviderStatus } from '../../../application/ports/LanguageModelPort.js';
import { ServiceUnavailableError } from '../../../domain/errors/FinancialQueryErrors.js';

export interface FallbackEntry {
  name: string;
  model: LanguageModelPort;
  maxAttempts: number;
}

export interface FallbackOptions {
  retryBackoffMs?: number;
  unconfigured?: Array<{ provider: string; model: string }>;
}

/**
 * Tries each provider in order and returns the first answer. A provider with
 * more than one attempt (a local model) is retried with exponential backoff
 * before moving on; hosted providers fail over immediately.
 */
export class FallbackLanguageModel implements LanguageModelPort {
  constructor(
    private readonly entries: FallbackEntry[],
    private readonly options: FallbackOptions = {},
  ) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    if (this.entries.length === 0) {
      throw new ServiceUnavailableError('No language model providers are configured');
    }

    let lastError: ServiceUnavailableError | undefined;

    for (const entry of this.entries) {
      for (let attempt = 0; attempt < entry.maxAttempts; attempt++) {
        if (options.signal?.aborted) {
          throw new ServiceUnavailableError('Language model request was abandoned', 'timeout');
        }

        try {
          console.log(`🤖 Trying ${entry.name} (attempt ${attempt + 1})`);
          const text = await entry.model.complete(prompt, options);
          console.log(`✅ Answer from ${entry.name}`);
          return text;
        } catch (error) {
          lastError =
            error instanceof ServiceUnavailableError
              ? error
              : new ServiceUnavailableError(error instanceof Error ? error.message : String(error));
          console.error(`❌ ${entry.name} failed:`, lastError.message);

          if (attempt < entry.maxAttempts - 1) {
            await sleep((this.options.retryBackoffMs ?? 1_000) * 2 ** attempt);
          }
        }
      }
    }

    throw new ServiceUnavailableError(
      `All language model providers failed. Last error: ${lastError?.message ?? 'unknown'}`,
      lastError?.reason ?? 'unavailable',
    );
  }

  async status(): Promise<ProviderStatus[]> {
    const probed = await Promise.all(this.entries.map((entry) => entry.model.status()));
    const unconfigured: ProviderStatus[] = (this.options.unconfigured ?? []).map((provider) => ({
      ...provider,
      status: 'NOT_CONFIGURED',
    }));

    return [...probed.flat(), ...unconfigured];
  }
}
