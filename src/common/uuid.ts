import { v7 as uuidv7, validate as validateUUID } from 'uuid';
import { z } from 'zod';

export type UUID = string & { readonly __brand: unique symbol };

/**
 * UUID v7 はタイムスタンプ順に並ぶため、created_at が同一の行の
 * 並び順の決定（タイブレーク）にも使える。
 */
export function createUUID(): UUID {
  return uuidv7() as UUID;
}

export function isUUID(value: string): value is UUID {
  return validateUUID(value);
}

export const UUIDSchema = z
  .string()
  .refine(isUUID, { message: 'Invalid uuid' });
