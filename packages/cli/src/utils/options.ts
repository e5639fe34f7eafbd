import { AfterBatchSchema, UsageError, type AfterBatch } from '@mender/shared';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new UsageError(`Expected a positive integer, got '${value}'.`);
  }
  return parsed;
}

export function parseAfterBatch(value: string): AfterBatch {
  const parsed = AfterBatchSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(`Invalid --after-batch '${value}'. Must be keep, discard, or ask.`);
  }
  return parsed.data;
}
