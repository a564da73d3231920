import { z } from 'zod';

export const CreateDebtSchema = z.object({
  userId: z.string().min(1),
  name: z.string().min(1),
  principal: z.number().nonnegative(),
  interestRate: z.number().nonnegative().lt(100),
});

export type CreateDebtDTO = z.infer<typeof CreateDebtSchema>;
