import { z } from 'zod';

export const StatementTransactionSchema = z.object({
  date: z.string(),
  description: z.string().min(1),
  amount: z.number().positive(),
  type: z.enum(['credit', 'debit']),
  category: z.string().optional(),
  balance: z.number().optional(),
});

export const StatementSchema = z.object({
  account_holder: z.string(),
  bank_name: z.string(),
  account_number: z.string(),
  statement_period: z.object({
    start_date: z.string(),
    end_date: z.string(),
  }),
  opening_balance: z.number(),
  closing_balance: z.number(),
  transactions: z.array(StatementTransactionSchema),
  currency: z.string().default('USD'),
});

export type StatementDTO = z.infer<typeof StatementSchema>;

export const ParsedResponseSchema = z.object({
  success: z.boolean(),
  data: StatementSchema.nullable(),
  error: z.string().nullable(),
  processing_time: z.number().nonnegative(),
});

export type ParsedResponseDTO = z.infer<typeof ParsedResponseSchema>;
