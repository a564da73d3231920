import type { Debt } from '../../domain/entities/Debt.js';
import type { CreateDebtDTO } from '../dto/DebtDTO.js';
import type { DebtStorePort } from '../ports/DebtStorePort.js';

export class DebtService {
  constructor(private readonly debtStore: DebtStorePort) {}

  async createDebt(input: CreateDebtDTO): Promise<Debt> {
    const debt = await this.debtStore.createDebt(input);
    console.log(`💳 Saved debt ${debt.id} for user ${debt.userId}`);
    return debt;
  }

  async listDebts(userId: string): Promise<Debt[]> {
    const debts = await this.debtStore.listDebts(userId);
    return [...debts].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async deleteDebt(debtId: string): Promise<boolean> {
    return this.debtStore.deleteDebt(debtId);
  }

  async deleteDebtsForUser(userId: string): Promise<number> {
    const removed = await this.debtStore.deleteDebtsForUser(userId);
    console.log(`🗑️ Deleted ${removed} debts for user ${userId}`);
    return removed;
  }
}
