import { z } from 'zod';

export const AskQuestionSchema = z.object({
  question: z.string().trim().min(1, 'Question is required'),
  userId: z.string().optional(),
});

export type AskQuestionDTO = z.infer<typeof AskQuestionSchema>;

export const AnswerSchema = z.object({
  answer: z.string(),
  intent: z.enum(['PAYOFF_TIME', 'MONTHLY_PAYMENT_REQUIRED', 'REPAYMENT_PLAN_FOR_STORED_DEBT', 'GENERAL_KNOWLEDGE']),
});

export type AnswerDTO = z.infer<typeof AnswerSchema>;
