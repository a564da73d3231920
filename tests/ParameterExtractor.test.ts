import { describe, expect, it } from 'vitest';
import { extractCandidates, extractParameters, pickClosest } from '../src/domain/services/ParameterExtractor.js';

describe('ParameterExtractor', () => {
  it('reads principal, rate and payment from a payoff question', () => {
    expect(extractParameters('How long to pay off a $5000 loan at 18% interest paying $150 a month?')).toEqual({
      principal: 5000,
      annualInterestRatePercent: 18,
      monthlyPayment: 150,
    });
  });

  it('converts a term in years to months', () => {
    expect(
      extractParameters('How much do I need to pay monthly to pay off a $10,000 loan at 6% in 3 years?'),
    ).toEqual({
      principal: 10000,
      annualInterestRatePercent: 6,
      termMonths: 36,
    });
  });

  it('understands amounts and rates written out in words', () => {
    expect(
      extractParameters(
        'I owe 2,500 dollars on my credit card with an APR of 22.9 percent and I pay 100 dollars each month. When will I be debt free?',
      ),
    ).toEqual({
      principal: 2500,
      annualInterestRatePercent: 22.9,
      monthlyPayment: 100,
    });
  });

  it('expands the k suffix and treats the amount after "pay off" as the balance', () => {
    expect(extractParameters('What monthly payment would pay off $12k over 2 years at 0% interest?')).toEqual({
      principal: 12000,
      annualInterestRatePercent: 0,
      termMonths: 24,
    });
  });

  it('picks the percentage nearest to a rate keyword', () => {
    expect(
      extractParameters('My loan rate is 7% but my savings earn 2%, I owe $9,000 and pay $300 monthly. How long to pay it off?'),
    ).toEqual({
      principal: 9000,
      annualInterestRatePercent: 7,
      monthlyPayment: 300,
    });
  });

  it('prefers the term introduced by "over" to an earlier duration', () => {
    expect(
      extractParameters(
        'I took a 30 year mortgage for $250,000 at 6.5%; what would my monthly payment be if I refinance it over 15 years?',
      ),
    ).toEqual({
      principal: 250000,
      annualInterestRatePercent: 6.5,
      termMonths: 180,
    });
  });

  it('reads a stored debt reference without mistaking it for an amount', () => {
    expect(extractParameters("If I pay $200 a month on debt #2, how long until it's paid off?")).toEqual({
      monthlyPayment: 200,
      debtId: '2',
    });
  });

  it('returns nothing for a question without numbers', () => {
    expect(extractParameters("What's the capital of France?")).toEqual({});
  });

  it('does not read a calendar year as an amount', () => {
    expect(
      extractParameters('What is the average student loan interest rate in 2024 and how long does it take to pay off?'),
    ).toEqual({});
    expect(extractParameters('In 2024 I borrowed $2,000')).toEqual({ principal: 2000 });
  });

  it('does not promote a bare number without a keyword to the principal', () => {
    expect(extractParameters('Is 450 a good credit score?')).toEqual({});
  });

  it('marks amounts that carry a currency', () => {
    const candidates = extractCandidates('I pay 300 dollars on a balance of 9000');

    expect(candidates.amounts.map((amount) => [amount.value, amount.marked])).toEqual([
      [300, true],
      [9000, false],
    ]);
  });

  it('returns a frozen result', () => {
    expect(Object.isFrozen(extractParameters('I owe $500 at 5% interest'))).toBe(true);
  });

  it('does not reuse a percentage or duration as an amount', () => {
    const candidates = extractCandidates('Borrowed 4000 at 12% for 24 months');

    expect(candidates.rates.map((rate) => rate.value)).toEqual([12]);
    expect(candidates.terms.map((term) => term.value)).toEqual([24]);
    expect(candidates.amounts.map((amount) => amount.value)).toEqual([4000]);
  });

  it('breaks distance ties by reading order', () => {
    const first = { value: 1, tokenIndex: 2, start: 10 };
    const second = { value: 2, tokenIndex: 6, start: 30 };

    expect(pickClosest([first, second], [4])).toBe(first);
    expect(pickClosest([], [4])).toBeUndefined();
  });
});
