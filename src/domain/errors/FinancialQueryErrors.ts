export class InvalidInputError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class NeverAmortizesError extends Error {
  constructor(
    public readonly monthlyInterest: number,
    public readonly minimumPayment: number,
  ) {
    super('Monthly payment does not cover the interest accrued each month.');
    this.name = 'NeverAmortizesError';
  }
}

export type UnavailableReason = 'unavailable' | 'timeout';

export class ServiceUnavailableError extends Error {
  constructor(
    message: string,
    public readonly reason: UnavailableReason = 'unavailable',
  ) {
    super(message);
    this.name = 'ServiceUnavailableError';
  }
}

export class DebtNotFoundError extends Error {
  constructor(public readonly debtId: string) {
    super(`Debt ${debtId} not found.`);
    this.name = 'DebtNotFoundError';
  }
}
