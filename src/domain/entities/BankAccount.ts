export interface BankAccount {
  id: string;
  projectId: string;
  accountNumber: string; // last 4 digits only
  bankName: string;
  accountType: string;
  color?: string;
  createdBy: string;
  createdAt: string;
  updatedAt?: string;
  updatedBy?: string;
}
