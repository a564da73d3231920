export interface CompletionOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ProviderStatus {
  provider: string;
  model: string;
  status: 'AVAILABLE' | 'UNAVAILABLE' | 'NOT_CONFIGURED';
  detail?: string;
}

/**
 * Text completion collaborator. Implementations reject with
 * ServiceUnavailableError when no answer can be produced in time.
 */
export interface LanguageModelPort {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
  status(): Promise<ProviderStatus[]>;
}
