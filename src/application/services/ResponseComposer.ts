import type { AmortizationResult, QueryIntent } from '../../domain/entities/FinancialQuery.js';
import { ServiceUnavailableError } from '../../domain/errors/FinancialQueryErrors.js';
import { splitMonths } from '../../domain/services/AmortizationCalculator.js';
import type { LanguageModelPort } from '../ports/LanguageModelPort.js';

export type CalculationOutcome =
  | {
      kind: 'PAYOFF';
      principal: number;
      annualInterestRatePercent: number;
      monthlyPayment: number;
      result: AmortizationResult;
      debtName?: string;
    }
  | {
      kind: 'REQUIRED_PAYMENT';
      principal: number;
      annualInterestRatePercent: number;
      termMonths: number;
      monthlyPayment: number;
    }
  | {
      kind: 'NEVER_AMORTIZES';
      monthlyPayment: number;
      monthlyInterest: number;
      minimumPayment: number;
    }
  | { kind: 'MISSING_PARAMETERS'; missing: string[] }
  | { kind: 'DEBT_NOT_FOUND'; debtId: string }
  | { kind: 'DEBT_STORE_UNAVAILABLE' }
  | { kind: 'INVALID_INPUT'; message: string };

export type CompletionOutcome = { ok: true; text: string } | { ok: false; error: ServiceUnavailableError };

export interface ComposeRequest {
  question: string;
  intent: QueryIntent;
  outcome: CalculationOutcome;
}

export interface ResponseComposerOptions {
  timeoutMs: number;
  currency?: string;
}

export const GENERAL_UNAVAILABLE_MESSAGE =
  "I'm having trouble reaching the assistant right now. Please try again in a moment.";

export const formatDuration = (totalMonths: number): string => {
  const { years, months } = splitMonths(totalMonths);
  const yearPart = `${years} ${years === 1 ? 'year' : 'years'}`;
  const monthPart = `${months} ${months === 1 ? 'month' : 'months'}`;

  if (years > 0 && months > 0) {
    return `${yearPart} and ${monthPart}`;
  }

  return years > 0 ? yearPart : monthPart;
};

export const joinLabels = (labels: string[]): string => {
  if (labels.length <= 1) {
    return labels.join('');
  }
  return `${labels.slice(0, -1).join(', ')} and ${labels[labels.length - 1]}`;
};

/** Picks the model's prose when there is some, otherwise the calculated summary. */
export const mergeAnswer = (summary: string, completion: CompletionOutcome): string => {
  if (completion.ok && completion.text.trim().length > 0) {
    return completion.text.trim();
  }
  return summary;
};

export const toServiceUnavailable = (error: unknown): ServiceUnavailableError => {
  if (error instanceof ServiceUnavailableError) {
    return error;
  }
  const message = error instanceof Error ? error.message : 'Language model request failed';
  return new ServiceUnavailableError(message, 'unavailable');
};

export class ResponseComposer {
  private readonly money: Intl.NumberFormat;

  constructor(
    private readonly languageModel: LanguageModelPort,
    private readonly options: ResponseComposerOptions,
  ) {
    this.money = new Intl.NumberFormat('en-US', { style: 'currency', currency: options.currency ?? 'USD' });
  }

  formatMoney(amount: number): string {
    return this.money.format(amount);
  }

  async compose(request: ComposeRequest): Promise<string> {
    const { outcome } = request;

    if (outcome.kind !== 'PAYOFF' && outcome.kind !== 'REQUIRED_PAYMENT') {
      return this.describeProblem(outcome);
    }

    const summary = this.buildSummary(outcome);
    console.log(`🤖 Explaining ${request.intent} calculation`);
    const completion = await this.runCompletion(this.buildExplanationPrompt(request.question, summary));

    if (!completion.ok) {
      console.log(`⚠️ Explanation unavailable (${completion.error.reason}), returning calculated summary`);
    }

    return mergeAnswer(summary, completion);
  }

  async composeGeneral(question: string): Promise<string> {
    const completion = await this.runCompletion(this.buildGeneralPrompt(question));

    if (!completion.ok) {
      console.error('❌ General answer unavailable:', completion.error.message);
      return GENERAL_UNAVAILABLE_MESSAGE;
    }

    return completion.text;
  }

  buildSummary(outcome: Extract<CalculationOutcome, { kind: 'PAYOFF' | 'REQUIRED_PAYMENT' }>): string {
    const principal = this.money.format(outcome.principal);
    const rate = `${outcome.annualInterestRatePercent}%`;
    const payment = this.money.format(outcome.monthlyPayment);

    if (outcome.kind === 'REQUIRED_PAYMENT') {
      return (
        `You would need to pay approximately ${payment} per month to pay off ${principal} ` +
        `at ${rate} interest in ${outcome.termMonths} months.`
      );
    }

    const { result } = outcome;
    const subject = outcome.debtName ? `${outcome.debtName} (${principal})` : principal;

    if (result.monthsToPayoff === 0) {
      return `There is no balance left to pay off on ${subject}.`;
    }

    return (
      `It will take ${formatDuration(result.monthsToPayoff)} (${result.monthsToPayoff} payments) to pay off ` +
      `${subject} at ${rate} interest with monthly payments of ${payment}. ` +
      `You will pay a total of ${this.money.format(result.totalPaid)}, which includes ` +
      `${this.money.format(result.totalInterest)} in interest.`
    );
  }

  describeProblem(outcome: Exclude<CalculationOutcome, { kind: 'PAYOFF' | 'REQUIRED_PAYMENT' }>): string {
    switch (outcome.kind) {
      case 'NEVER_AMORTIZES':
        return (
          `A monthly payment of ${this.money.format(outcome.monthlyPayment)} does not cover the ` +
          `${this.money.format(outcome.monthlyInterest)} of interest that accrues each month, so the balance ` +
          `would never go down. You need to pay at least ${this.money.format(outcome.minimumPayment)} per month ` +
          'to start reducing the principal.'
        );
      case 'MISSING_PARAMETERS': {
        const fields = joinLabels(outcome.missing);
        return `I couldn't find the ${fields} in your question. Could you ask again and include the ${fields}?`;
      }
      case 'DEBT_NOT_FOUND':
        return (
          `I couldn't find a saved debt with id ${outcome.debtId}. Please check the debt id, ` +
          'or include the loan amount and interest rate in your question.'
        );
      case 'DEBT_STORE_UNAVAILABLE':
        return (
          "I couldn't look up your saved debts right now. Please try again shortly, " +
          'or include the loan amount and interest rate in your question.'
        );
      case 'INVALID_INPUT':
        return `I can't run that calculation: ${outcome.message}`;
    }
  }

  private buildExplanationPrompt(question: string, summary: string): string {
    return `You are a friendly assistant that helps people understand their debt repayment.
The user asked: "${question}"

These figures were calculated exactly and must not be changed or recalculated:
${summary}

Explain what these numbers mean in plain, encouraging language. Repeat the figures exactly as given.
Finish with one or two general tips for paying debt off faster, such as extra payments or a lower interest rate.`;
  }

  private buildGeneralPrompt(question: string): string {
    return `You are a helpful and friendly assistant focused on personal finance and debt repayment.
Answer the question accurately and conversationally. If the question is unclear, ask for clarification.
If you don't know the answer, say so honestly, and point to reputable sources where that helps.

Question: ${question}
Answer:`;
  }

  private async runCompletion(prompt: string): Promise<CompletionOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new ServiceUnavailableError(`No answer within ${this.options.timeoutMs}ms`, 'timeout'));
      }, this.options.timeoutMs);
    });

    try {
      const text = await Promise.race([
        this.languageModel.complete(prompt, { timeoutMs: this.options.timeoutMs, signal: controller.signal }),
        deadline,
      ]);
      return { ok: true, text };
    } catch (error) {
      return { ok: false, error: toServiceUnavailable(error) };
    } finally {
      clearTimeout(timer);
    }
  }
}
