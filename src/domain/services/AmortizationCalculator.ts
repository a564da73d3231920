import type { AmortizationResult, NeverPaysOff, PayoffOutcome } from '../entities/FinancialQuery.js';
import { InvalidInputError } from '../errors/FinancialQueryErrors.js';

// Guards Math.ceil against values like 12.000000000001 produced by log/division.
const MONTH_EPSILON = 1e-9;

export const roundCurrency = (value: number): number => Math.round((value + Number.EPSILON) * 100) / 100;

export const monthlyRate = (annualRatePercent: number): number => annualRatePercent / 100 / 12;

const assertAmount = (value: number, field: string): void => {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(`${field} must be a non-negative number.`, field);
  }
};

const assertTerm = (termMonths: number): void => {
  if (!Number.isInteger(termMonths) || termMonths <= 0) {
    throw new InvalidInputError('termMonths must be a positive whole number of months.', 'termMonths');
  }
};

/** One month of interest, rounded to cents, plus one dollar. */
export const minimumEffectivePayment = (principal: number, annualRatePercent: number): number => {
  assertAmount(principal, 'principal');
  assertAmount(annualRatePercent, 'annualRatePercent');
  return roundCurrency(roundCurrency(principal * monthlyRate(annualRatePercent)) + 1);
};

export const monthsToPayoff = (principal: number, annualRatePercent: number, monthlyPayment: number): PayoffOutcome => {
  assertAmount(principal, 'principal');
  assertAmount(annualRatePercent, 'annualRatePercent');
  assertAmount(monthlyPayment, 'monthlyPayment');

  if (principal === 0) {
    return { status: 'PAYS_OFF', monthsToPayoff: 0, totalPaid: 0, totalInterest: 0 };
  }

  const rate = monthlyRate(annualRatePercent);
  const monthlyInterest = principal * rate;

  if (monthlyPayment <= monthlyInterest) {
    const neverPaysOff: NeverPaysOff = {
      status: 'NEVER_PAYS_OFF',
      monthlyInterest: roundCurrency(monthlyInterest),
      minimumPayment: minimumEffectivePayment(principal, annualRatePercent),
    };
    return neverPaysOff;
  }

  const exactMonths =
    rate === 0 ? principal / monthlyPayment : -Math.log(1 - monthlyInterest / monthlyPayment) / Math.log(1 + rate);
  const months = Math.max(1, Math.ceil(exactMonths - MONTH_EPSILON));

  let totalPaid = principal;
  if (rate > 0) {
    // Balance left after the second-to-last payment; the last installment settles it plus one month of interest.
    const growth = Math.pow(1 + rate, months - 1);
    const remaining = principal * growth - (monthlyPayment * (growth - 1)) / rate;
    totalPaid = monthlyPayment * (months - 1) + Math.max(0, remaining) * (1 + rate);
  }

  const result: AmortizationResult = {
    status: 'PAYS_OFF',
    monthsToPayoff: months,
    totalPaid: roundCurrency(totalPaid),
    totalInterest: roundCurrency(totalPaid - principal),
  };
  return result;
};

export const requiredMonthlyPayment = (principal: number, annualRatePercent: number, termMonths: number): number => {
  assertAmount(principal, 'principal');
  assertAmount(annualRatePercent, 'annualRatePercent');
  assertTerm(termMonths);

  const rate = monthlyRate(annualRatePercent);

  if (rate === 0) {
    return roundCurrency(principal / termMonths);
  }

  return roundCurrency((principal * rate) / (1 - Math.pow(1 + rate, -termMonths)));
};

export const splitMonths = (totalMonths: number): { years: number; months: number } => ({
  years: Math.floor(totalMonths / 12),
  months: totalMonths % 12,
});
