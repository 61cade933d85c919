import { z } from 'zod';
import { ERROR_KINDS } from '../control-plane/errors.js';
import { SETTLED_OUTCOMES } from '../control-plane/types.js';

export const ledgerEntrySchema = z.object({
  sourcePath: z.string().min(1),
  fingerprint: z.string().min(1),
  destinationPath: z.string().min(1),
  completedAt: z.string().min(1),
  /** Source size and mtime at stabilization; absent in entries from older ledgers. */
  sourceSize: z.number().int().nonnegative().optional(),
  sourceMtimeMs: z.number().nonnegative().optional(),
});

export type LedgerEntry = z.infer<typeof ledgerEntrySchema>;

export const historyRecordSchema = z.object({
  timestamp: z.string(),
  sourcePath: z.string(),
  outcome: z.enum(SETTLED_OUTCOMES),
  attempts: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
  destinationPath: z.string().optional(),
  errorKind: z.enum(ERROR_KINDS).optional(),
  message: z.string().optional(),
});

export type HistoryRecord = z.infer<typeof historyRecordSchema>;
