import dayjs from 'dayjs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { CalculatorService } from '../src/application/services/CalculatorService.js';
import { ResponseComposer } from '../src/application/services/ResponseComposer.js';
import { DebtNotFoundError, NeverAmortizesError } from '../src/domain/errors/FinancialQueryErrors.js';
import { InMemoryDebtStore } from '../src/infrastructure/adapters/storage/InMemoryDebtStore.js';
import { answeringLanguageModel, silenceConsole } from './support/fakes.js';

describe('CalculatorService', () => {
  let store: InMemoryDebtStore;
  let calculator: CalculatorService;

  beforeEach(() => {
    vi.restoreAllMocks();
    silenceConsole();
    store = new InMemoryDebtStore();
    const composer = new ResponseComposer(answeringLanguageModel('unused').model, { timeoutMs: 1_000 });
    calculator = new CalculatorService(store, composer, () => dayjs('2026-01-15'));
  });

  it('builds a payoff plan with a payoff month', () => {
    expect(calculator.payoffTime({ debtAmount: 5000, interestRate: 18, monthlyPayment: 150 })).toEqual({
      answer:
        'It will take 3 years and 11 months (47 payments) to pay off $5,000.00 at 18% interest with monthly ' +
        'payments of $150.00. You will pay a total of $6,983.60, which includes $1,983.60 in interest.',
      plan: {
        years: 3,
        months: 11,
        totalMonths: 47,
        totalPaid: 6983.6,
        totalInterest: 1983.6,
        payoffDate: '2029-12',
      },
    });
  });

  it('leaves the payoff month empty when it is beyond the calendar', () => {
    expect(calculator.payoffTime({ debtAmount: 1e12, interestRate: 0, monthlyPayment: 0.01 }).plan).toEqual({
      years: 8333333333333,
      months: 4,
      totalMonths: 1e14,
      totalPaid: 1e12,
      totalInterest: 0,
      payoffDate: null,
    });
  });

  it('explains a payment that never pays off without a plan', () => {
    const answer = calculator.payoffTime({ debtAmount: 5000, interestRate: 18, monthlyPayment: 75 });

    expect(answer.plan).toBeUndefined();
    expect(answer.answer).toContain('You need to pay at least $76.00 per month');
  });

  it('computes the required monthly payment', () => {
    expect(calculator.monthlyPayment({ debtAmount: 5000, interestRate: 18, months: 48 })).toEqual({
      answer: 'You would need to pay approximately $146.87 per month to pay off $5,000.00 at 18% interest in 48 months.',
      monthlyPayment: 146.87,
    });
  });

  it('refuses a term of zero months', () => {
    expect(calculator.monthlyPayment({ debtAmount: 5000, interestRate: 18, months: 0 })).toEqual({
      answer: 'The number of months must be greater than zero.',
    });
  });

  describe('repaymentPlan', () => {
    it('plans a saved debt', async () => {
      const debt = await store.createDebt({ userId: 'user-1', name: 'Car loan', principal: 2000, interestRate: 12 });

      await expect(calculator.repaymentPlan({ debtId: debt.id, monthlyPayment: 500 })).resolves.toEqual({
        years: 0,
        months: 5,
        totalMonths: 5,
        totalPaid: 2051.52,
        totalInterest: 51.52,
        payoffDate: '2026-06',
      });
    });

    it('rejects an unknown debt', async () => {
      await expect(calculator.repaymentPlan({ debtId: '42', monthlyPayment: 500 })).rejects.toBeInstanceOf(
        DebtNotFoundError,
      );
    });

    it('rejects a payment that does not cover the interest', async () => {
      const debt = await store.createDebt({ userId: 'user-1', name: 'Car loan', principal: 2000, interestRate: 12 });

      await expect(calculator.repaymentPlan({ debtId: debt.id, monthlyPayment: 20 })).rejects.toMatchObject({
        name: 'NeverAmortizesError',
        minimumPayment: 21,
      });
      await expect(calculator.repaymentPlan({ debtId: debt.id, monthlyPayment: 20 })).rejects.toBeInstanceOf(
        NeverAmortizesError,
      );
    });
  });
});
