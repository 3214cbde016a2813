import { z } from 'zod';
import {
  confidenceSubjectSchema,
  moneySchema,
  rawCandidateSchema,
  transactionLikeSchema,
  transactionRecordSchema,
} from './transaction.schema';

const threshold = z.number().min(0).max(100).optional();

// Per-request record limit (duplicate batch checks are O(n²))
const MAX_RECORDS = 5000;

const records = z.array(transactionRecordSchema).max(MAX_RECORDS);

export const suggestCategoryBody = z.object({
  vendor: z.string().min(1, 'vendor is required'),
  notes: z.string().optional(),
});

export const reconcileCandidateBody = z.object({
  candidate: rawCandidateSchema,
  existing: records.default([]),
});

export const analyzeConfidenceBody = z.object({
  record: confidenceSubjectSchema,
});

export const findDuplicatesBody = z.object({
  candidate: transactionLikeSchema,
  existing: z.array(transactionLikeSchema).max(MAX_RECORDS),
  threshold,
});

export const batchCheckBody = z.object({
  records: z.array(transactionLikeSchema).max(MAX_RECORDS),
  threshold,
});

export const recordsBody = z.object({
  records,
});

export const recalculateLedgerBody = z.object({
  openingBalance: moneySchema.default(0),
  records,
});

export type SuggestCategoryBody = z.infer<typeof suggestCategoryBody>;
export type ReconcileCandidateBody = z.infer<typeof reconcileCandidateBody>;
export type AnalyzeConfidenceBody = z.infer<typeof analyzeConfidenceBody>;
export type FindDuplicatesBody = z.infer<typeof findDuplicatesBody>;
export type BatchCheckBody = z.infer<typeof batchCheckBody>;
export type RecordsBody = z.infer<typeof recordsBody>;
export type RecalculateLedgerBody = z.infer<typeof recalculateLedgerBody>;
