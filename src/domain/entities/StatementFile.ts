export interface StatementFile {
  id: string;
  bankAccountId: string;
  filePath: string;
  periodStart: string; // ISO date
  periodEnd: string; // ISO date
  uploadedBy: string;
  uploadedAt: string;
  updatedAt?: string;
  updatedBy?: string;
}
