import { z } from 'zod';

const interestRate = z
  .number()
  .min(0, 'Interest rate must be a percentage between 0 and 100.')
  .lt(100, 'Interest rate must be a percentage between 0 and 100.');

export const PayoffTimeRequestSchema = z.object({
  debtAmount: z.number().nonnegative(),
  interestRate,
  monthlyPayment: z.number().nonnegative(),
});

export type PayoffTimeRequestDTO = z.infer<typeof PayoffTimeRequestSchema>;

export const MonthlyPaymentRequestSchema = z.object({
  debtAmount: z.number().nonnegative(),
  interestRate,
  months: z.number().int(),
});

export type MonthlyPaymentRequestDTO = z.infer<typeof MonthlyPaymentRequestSchema>;

export const RepaymentPlanRequestSchema = z.object({
  debtId: z.union([z.string().min(1), z.number().int().nonnegative()]).transform((value) => String(value)),
  monthlyPayment: z.number().nonnegative(),
});

export type RepaymentPlanRequestDTO = z.infer<typeof RepaymentPlanRequestSchema>;

export const PayoffPlanSchema = z.object({
  years: z.number().int(),
  months: z.number().int(),
  totalMonths: z.number().int(),
  totalPaid: z.number(),
  totalInterest: z.number(),
  // Null when the payoff month lies beyond the calendar's range.
  payoffDate: z.string().nullable(),
});

export type PayoffPlanDTO = z.infer<typeof PayoffPlanSchema>;
