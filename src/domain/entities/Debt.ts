export interface Debt {
  id: string;
  userId: string;
  name: string;
  principal: number;
  interestRate: number; // annual percent, 18 means 18%
  createdAt: string; // ISO timestamp
}
