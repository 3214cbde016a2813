/**
 * Request schemas for transaction-shaped payloads.
 *
 * The HTTP layer is stateless: every request carries the records it
 * operates on, so these mirror the engine's record types.
 */

import { z } from 'zod';

const probability = z.number().min(0).max(1);
// Largest amount whose cents are still a safe integer
const MAX_MONEY = Number.MAX_SAFE_INTEGER / 100;

export const moneySchema = z
  .number()
  .finite()
  .min(-MAX_MONEY, 'amount is too large')
  .max(MAX_MONEY, 'amount is too large');
const optionalText = z.string().nullish();

export const recordIdSchema = z.union([z.number().int(), z.string().min(1)]);

export const confidenceVectorSchema = z.object({
  vendor: probability,
  amount: probability,
  date: probability,
  category: probability,
  transactionType: probability.optional(),
});

/**
 * A persisted record as the caller's record store holds it.
 * Engine-owned fields default to their initial values.
 */
export const transactionRecordSchema = z.object({
  id: recordIdSchema.nullable().default(null),
  date: z.string(),
  vendor: z.string(),
  income: moneySchema.nonnegative().default(0),
  expense: moneySchema.nonnegative().default(0),
  transactionType: z.enum(['income', 'expense']).default('expense'),
  currency: z.string().min(1).default('PKR'),
  category: z.string().min(1).default('Other'),
  notes: z.string().nullable().default(null),
  confidence: confidenceVectorSchema.default({ vendor: 0.5, amount: 0.5, date: 0.5, category: 0.5 }),
  isDuplicate: z.boolean().default(false),
  duplicateOf: recordIdSchema.nullable().default(null),
  needsReview: z.boolean().default(false),
  remainingBalance: moneySchema.default(0),
  sourceFile: z.string().default(''),
  rawText: z.string().nullable().default(null),
});

/**
 * Anything the similarity scorer can compare.
 */
export const transactionLikeSchema = z.object({
  id: recordIdSchema.nullish(),
  date: optionalText,
  vendor: optionalText,
  merchant: optionalText,
  description: optionalText,
  income: moneySchema.nullish(),
  expense: moneySchema.nullish(),
  amount: moneySchema.nullish(),
  category: optionalText,
});

export const confidenceSubjectSchema = transactionLikeSchema.extend({
  confidence: confidenceVectorSchema.partial().nullish(),
});

/**
 * Raw output of the field-extraction step. Every field is optional and
 * confidence values are clamped later, so any number is accepted here.
 */
export const rawCandidateSchema = transactionLikeSchema.extend({
  transactionType: optionalText,
  currency: optionalText,
  notes: optionalText,
  confidence: z
    .object({
      vendor: z.number(),
      amount: z.number(),
      date: z.number(),
      category: z.number(),
      transactionType: z.number(),
    })
    .partial()
    .nullish(),
  sourceFile: optionalText,
  rawText: optionalText,
});

export type TransactionRecordBody = z.infer<typeof transactionRecordSchema>;
