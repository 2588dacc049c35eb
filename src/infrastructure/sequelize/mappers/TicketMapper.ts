import { z } from 'zod';
import type { TokenRecord } from '../../../domain/model/TokenRecord.js';
import { StoreError } from '../../../domain/errors/StoreError.js';

const ticketSchema = z.object({
  id: z.union([z.number(), z.string()]),
  token: z.string(),
});

export function toRow(record: TokenRecord): { id: TokenRecord['id']; token: string } {
  return { id: record.id, token: record.token };
}

export function toDomain(plain: unknown): TokenRecord {
  const result = ticketSchema.safeParse(plain);
  if (!result.success) {
    throw new StoreError(`Unexpected ticket row: ${result.error.message}`, { transient: false });
  }
  return result.data;
}
