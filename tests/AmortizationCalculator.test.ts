import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '../src/domain/errors/FinancialQueryErrors.js';
import {
  minimumEffectivePayment,
  monthsToPayoff,
  requiredMonthlyPayment,
  roundCurrency,
  splitMonths,
} from '../src/domain/services/AmortizationCalculator.js';

describe('AmortizationCalculator', () => {
  describe('monthsToPayoff', () => {
    it('divides evenly when there is no interest', () => {
      expect(monthsToPayoff(1200, 0, 100)).toEqual({
        status: 'PAYS_OFF',
        monthsToPayoff: 12,
        totalPaid: 1200,
        totalInterest: 0,
      });
    });

    it('pays off a credit card balance at 18%', () => {
      expect(monthsToPayoff(5000, 18, 150)).toEqual({
        status: 'PAYS_OFF',
        monthsToPayoff: 47,
        totalPaid: 6983.6,
        totalInterest: 1983.6,
      });
    });

    it('caps the final payment at the remaining balance plus interest', () => {
      // 2000 at 1% a month: the fifth installment only needs 51.52, not a full 500.
      expect(monthsToPayoff(2000, 12, 500)).toEqual({
        status: 'PAYS_OFF',
        monthsToPayoff: 5,
        totalPaid: 2051.52,
        totalInterest: 51.52,
      });
    });

    it('reports a payment equal to the accrued interest as never paying off', () => {
      expect(monthsToPayoff(5000, 18, 75)).toEqual({
        status: 'NEVER_PAYS_OFF',
        monthlyInterest: 75,
        minimumPayment: 76,
      });
    });

    it('reports a zero payment on an interest-free loan as never paying off', () => {
      expect(monthsToPayoff(1000, 0, 0)).toEqual({
        status: 'NEVER_PAYS_OFF',
        monthlyInterest: 0,
        minimumPayment: 1,
      });
    });

    it('returns zero months for a zero balance', () => {
      expect(monthsToPayoff(0, 18, 150)).toEqual({
        status: 'PAYS_OFF',
        monthsToPayoff: 0,
        totalPaid: 0,
        totalInterest: 0,
      });
    });

    it('returns a finite positive month count whenever the payment exceeds the interest', () => {
      const cases: Array<[number, number]> = [
        [1000, 5],
        [25000, 3.5],
        [785900, 6.875],
        [300, 29.99],
      ];

      for (const [principal, rate] of cases) {
        const interest = (principal * rate) / 100 / 12;
        const result = monthsToPayoff(principal, rate, interest + 10);
        expect(result.status).toBe('PAYS_OFF');
        if (result.status === 'PAYS_OFF') {
          expect(Number.isInteger(result.monthsToPayoff)).toBe(true);
          expect(result.monthsToPayoff).toBeGreaterThan(0);
          expect(Number.isFinite(result.totalPaid)).toBe(true);
        }
      }
    });

    it('computes totals without walking every month of a very long payoff', () => {
      expect(monthsToPayoff(1e12, 0, 0.01)).toEqual({
        status: 'PAYS_OFF',
        monthsToPayoff: 1e14,
        totalPaid: 1e12,
        totalInterest: 0,
      });
    });

    it('rejects negative and non-finite input', () => {
      expect(() => monthsToPayoff(-1, 5, 100)).toThrow(InvalidInputError);
      expect(() => monthsToPayoff(1000, -5, 100)).toThrow(InvalidInputError);
      expect(() => monthsToPayoff(1000, 5, Number.NaN)).toThrow(InvalidInputError);
      expect(() => monthsToPayoff(Number.POSITIVE_INFINITY, 5, 100)).toThrow(InvalidInputError);
    });
  });

  describe('requiredMonthlyPayment', () => {
    it('matches the amortization table value for 5000 at 18% over 48 months', () => {
      expect(requiredMonthlyPayment(5000, 18, 48)).toBe(146.87);
    });

    it('matches the amortization table value for 10000 at 6% over 36 months', () => {
      expect(requiredMonthlyPayment(10000, 6, 36)).toBe(304.22);
    });

    it('splits the principal evenly without interest', () => {
      expect(requiredMonthlyPayment(12000, 0, 24)).toBe(500);
      expect(requiredMonthlyPayment(1000, 0, 3)).toBe(333.33);
    });

    it('round-trips through monthsToPayoff within one month', () => {
      const cases: Array<[number, number, number]> = [
        [5000, 18, 48],
        [10000, 6, 36],
        [250000, 6.5, 180],
        [1800, 0, 18],
      ];

      for (const [principal, rate, term] of cases) {
        const payment = requiredMonthlyPayment(principal, rate, term);
        const result = monthsToPayoff(principal, rate, payment);
        expect(result.status).toBe('PAYS_OFF');
        if (result.status === 'PAYS_OFF') {
          expect(Math.abs(result.monthsToPayoff - term)).toBeLessThanOrEqual(1);
        }
      }
    });

    it('rejects terms that are not positive whole months', () => {
      expect(() => requiredMonthlyPayment(1000, 5, 0)).toThrow(InvalidInputError);
      expect(() => requiredMonthlyPayment(1000, 5, 12.5)).toThrow(InvalidInputError);
      expect(() => requiredMonthlyPayment(1000, 5, -12)).toThrow(InvalidInputError);
    });
  });

  it('rounds half up to cents', () => {
    expect(roundCurrency(1.005)).toBe(1.01);
    expect(roundCurrency(2.344)).toBe(2.34);
  });

  it('suggests one dollar above the monthly interest', () => {
    expect(minimumEffectivePayment(2000, 12)).toBe(21);
  });

  it('splits months into years and months', () => {
    expect(splitMonths(47)).toEqual({ years: 3, months: 11 });
    expect(splitMonths(12)).toEqual({ years: 1, months: 0 });
  });
});
