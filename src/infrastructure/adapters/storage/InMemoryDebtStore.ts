import type { Debt } from '../../../domain/entities/Debt.js';
import type { CreateDebtDTO } from '../../../application/dto/DebtDTO.js';
import type { DebtStorePort } from '../../../application/ports/DebtStorePort.js';

export class InMemoryDebtStore implements DebtStorePort {
  private readonly debts = new Map<string, Debt>();
  private sequence = 0;

  constructor(seed: Debt[] = []) {
    seed.forEach((debt) => {
      this.debts.set(debt.id, debt);
      const numericId = Number(debt.id);
      if (Number.isInteger(numericId) && numericId > this.sequence) {
        this.sequence = numericId;
      }
    });
  }

  async getDebt(debtId: string): Promise<Debt | null> {
    return this.debts.get(debtId) ?? null;
  }

  async listDebts(userId: string): Promise<Debt[]> {
    return Array.from(this.debts.values()).filter((debt) => debt.userId === userId);
  }

  async createDebt(input: CreateDebtDTO): Promise<Debt> {
    // Sequential ids keep debts addressable from questions such as "debt #3".
    this.sequence += 1;

    const debt: Debt = {
      id: String(this.sequence),
      userId: input.userId,
      name: input.name,
      principal: input.principal,
      interestRate: input.interestRate,
      createdAt: new Date().toISOString(),
    };

    this.debts.set(debt.id, debt);
    return debt;
  }

  async deleteDebt(debtId: string): Promise<boolean> {
    return this.debts.delete(debtId);
  }

  async deleteDebtsForUser(userId: string): Promise<number> {
    const owned = Array.from(this.debts.values()).filter((debt) => debt.userId === userId);
    owned.forEach((debt) => this.debts.delete(debt.id));
    return owned.length;
  }
}
