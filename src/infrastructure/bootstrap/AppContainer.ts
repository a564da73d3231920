import type { LanguageModelPort } from '../../application/ports/LanguageModelPort.js';
import type { DebtStorePort } from '../../application/ports/DebtStorePort.js';
import { CalculatorService } from '../../application/services/CalculatorService.js';
import { DebtService } from '../../application/services/DebtService.js';
import { QueryResolutionService } from '../../application/services/QueryResolutionService.js';
import { ResponseComposer } from '../../application/services/ResponseComposer.js';
import { FallbackLanguageModel } from '../adapters/llm/FallbackLanguageModel.js';
import { OpenAICompatibleLanguageModel } from '../adapters/llm/OpenAICompatibleLanguageModel.js';
import { InMemoryDebtStore } from '../adapters/storage/InMemoryDebtStore.js';
import { type AppConfig, loadConfig } from '../config/Config.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  debtStore?: DebtStorePort;
  languageModel?: LanguageModelPort;
}

export class AppContainer {
  readonly config: AppConfig;

  readonly debtStore: DebtStorePort;
  readonly languageModel: LanguageModelPort;
  readonly composer: ResponseComposer;
  readonly queryResolution: QueryResolutionService;
  readonly calculator: CalculatorService;
  readonly debtService: DebtService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.debtStore = overrides.debtStore ?? new InMemoryDebtStore();
    this.languageModel = overrides.languageModel ?? this.buildLanguageModel();

    this.composer = new ResponseComposer(this.languageModel, {
      timeoutMs: this.config.llm.timeoutMs,
      currency: this.config.app.baseCurrency,
    });
    this.queryResolution = new QueryResolutionService(this.debtStore, this.composer);
    this.calculator = new CalculatorService(this.debtStore, this.composer);
    this.debtService = new DebtService(this.debtStore);
  }

  configuredProviders(): string[] {
    return this.config.llm.providers.filter((provider) => provider.enabled).map((provider) => provider.name);
  }

  private buildLanguageModel(): LanguageModelPort {
    const { providers, retryBackoffMs } = this.config.llm;
    const enabled = providers.filter((provider) => provider.enabled);

    if (enabled.length === 0) {
      console.log('⚠️ No language model configured, answers will use calculated summaries only');
    }

    return new FallbackLanguageModel(
      enabled.map((provider) => ({
        name: provider.name,
        model: new OpenAICompatibleLanguageModel(provider),
        maxAttempts: provider.maxAttempts,
      })),
      {
        retryBackoffMs,
        unconfigured: providers
          .filter((provider) => !provider.enabled)
          .map((provider) => ({ provider: provider.name, model: provider.model })),
      },
    );
  }
}
