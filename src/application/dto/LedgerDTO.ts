import { z } from 'zod';

const requiredText = z.string().trim().min(1, 'Field cannot be empty or whitespace only');
const optionalText = z.string().trim().optional();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');
const positiveAmount = z.coerce.number().positive('Amount must be greater than zero');
const queryBoolean = z.enum(['true', 'false']).transform((value) => value === 'true');

export const ProjectCreateSchema = z.object({
  name: requiredText.max(255),
  developerName: requiredText,
  investorName: requiredText,
  remarks: optionalText,
  createdBy: requiredText,
});

export const ProjectUpdateSchema = z.object({
  name: requiredText.max(255).optional(),
  developerName: requiredText.optional(),
  investorName: requiredText.optional(),
  remarks: optionalText,
  isActivated: z.boolean().optional(),
  updatedBy: requiredText.optional(),
});

export const ProjectFilterSchema = z.object({
  is_activated: queryBoolean.optional(),
  search: z.string().optional(),
});

export const BankAccountCreateSchema = z.object({
  projectId: z.string().uuid(),
  accountNumber: requiredText,
  bankName: requiredText,
  accountType: requiredText,
  color: optionalText,
  createdBy: requiredText,
});

export const BankAccountUpdateSchema = z.object({
  accountNumber: requiredText.optional(),
  bankName: requiredText.optional(),
  accountType: requiredText.optional(),
  color: optionalText,
  updatedBy: requiredText.optional(),
});

export const BankAccountFilterSchema = z.object({
  project_id: z.string().optional(),
  search: z.string().optional(),
});

export const CategoryCreateSchema = z.object({
  name: requiredText,
  identificationRegex: optionalText,
  color: optionalText,
  description: optionalText,
  createdBy: requiredText,
});

export const CategoryUpdateSchema = z.object({
  name: requiredText.optional(),
  identificationRegex: optionalText,
  color: optionalText,
  description: optionalText,
  isActive: z.boolean().optional(),
  updatedBy: requiredText.optional(),
});

export const CategoryFilterSchema = z.object({
  is_active: queryBoolean.optional(),
  search: z.string().optional(),
});

export const StatementFileCreateSchema = z.object({
  bankAccountId: z.string().uuid(),
  filePath: requiredText,
  periodStart: isoDate,
  periodEnd: isoDate,
  uploadedBy: requiredText,
});

export const StatementFileUpdateSchema = z.object({
  filePath: requiredText.optional(),
  periodStart: isoDate.optional(),
  periodEnd: isoDate.optional(),
  updatedBy: requiredText.optional(),
});

export const StatementFileFilterSchema = z.object({
  bank_account_id: z.string().optional(),
  search: z.string().optional(),
});

export const StatementEntryCreateSchema = z.object({
  statementFileId: z.string().uuid(),
  bankAccountId: z.string().uuid(),
  categoryId: z.string().uuid().optional(),
  tags: z.array(z.string()).optional(),
  date: isoDate,
  time: optionalText,
  description: requiredText,
  transactionReference: optionalText,
  debitCredit: z.enum(['credit', 'debit']),
  amount: positiveAmount,
  balance: z.coerce.number().optional(),
  notes: optionalText,
});

export const StatementEntryUpdateSchema = z.object({
  categoryId: z.string().uuid().optional(),
  tags: z.array(z.string()).optional(),
  date: isoDate.optional(),
  time: optionalText,
  description: requiredText.optional(),
  transactionReference: optionalText,
  debitCredit: z.enum(['credit', 'debit']).optional(),
  amount: positiveAmount.optional(),
  balance: z.coerce.number().optional(),
  notes: optionalText,
  updatedBy: requiredText.optional(),
});

export const StatementEntryFilterSchema = z.object({
  bank_account_id: z.string().optional(),
  statement_file_id: z.string().optional(),
  category_id: z.string().optional(),
  transaction_type: z.enum(['credit', 'debit']).optional(),
  search: z.string().optional(),
});

export const EntrySplitCreateSchema = z.object({
  entryId: z.string().uuid(),
  categoryId: z.string().uuid(),
  amount: positiveAmount,
  description: optionalText,
});

export const EntrySplitUpdateSchema = z.object({
  categoryId: z.string().uuid().optional(),
  amount: positiveAmount.optional(),
  description: optionalText,
  updatedBy: requiredText.optional(),
});

export const EntrySplitFilterSchema = z.object({
  entry_id: z.string().optional(),
  category_id: z.string().optional(),
});

export type ProjectCreateDTO = z.infer<typeof ProjectCreateSchema>;
export type ProjectUpdateDTO = z.infer<typeof ProjectUpdateSchema>;
export type ProjectFilterDTO = z.infer<typeof ProjectFilterSchema>;
export type BankAccountCreateDTO = z.infer<typeof BankAccountCreateSchema>;
export type BankAccountUpdateDTO = z.infer<typeof BankAccountUpdateSchema>;
export type BankAccountFilterDTO = z.infer<typeof BankAccountFilterSchema>;
export type CategoryCreateDTO = z.infer<typeof CategoryCreateSchema>;
export type CategoryUpdateDTO = z.infer<typeof CategoryUpdateSchema>;
export type CategoryFilterDTO = z.infer<typeof CategoryFilterSchema>;
export type StatementFileCreateDTO = z.infer<typeof StatementFileCreateSchema>;
export type StatementFileUpdateDTO = z.infer<typeof StatementFileUpdateSchema>;
export type StatementFileFilterDTO = z.infer<typeof StatementFileFilterSchema>;
export type StatementEntryCreateDTO = z.infer<typeof StatementEntryCreateSchema>;
export type StatementEntryUpdateDTO = z.infer<typeof StatementEntryUpdateSchema>;
export type StatementEntryFilterDTO = z.infer<typeof StatementEntryFilterSchema>;
export type EntrySplitCreateDTO = z.infer<typeof EntrySplitCreateSchema>;
export type EntrySplitUpdateDTO = z.infer<typeof EntrySplitUpdateSchema>;
export type EntrySplitFilterDTO = z.infer<typeof EntrySplitFilterSchema>;
