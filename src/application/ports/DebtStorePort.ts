import type { Debt } from '../../domain/entities/Debt.js';
import type { CreateDebtDTO } from '../dto/DebtDTO.js';

export interface DebtStorePort {
  getDebt(debtId: string): Promise<Debt | null>;
  listDebts(userId: string): Promise<Debt[]>;
  createDebt(input: CreateDebtDTO): Promise<Debt>;
  deleteDebt(debtId: string): Promise<boolean>;
  deleteDebtsForUser(userId: string): Promise<number>;
}
