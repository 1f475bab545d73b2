/**
 * Cipher record loading
 * One JSON object per file holding the ciphertext and the plaintext it decrypts to
 */

import fs from 'node:fs';
import { z } from 'zod';
import { DEFAULT_FIELDS, type RecordFields } from './config.js';
import { RecordParseError, RecordValidationError, StorageError } from './errors.js';
import type { CipherRecord } from './types.js';

const RecordObject = z.record(z.string(), z.unknown());
const CipherText = z.string();
// a line break would shift every later line of the .tgt file
const PlainText = z.string().refine(s => !/[\r\n]/.test(s), { message: 'must not contain line breaks' });

function readField(obj: Record<string, unknown>, key: string, schema: z.ZodType<string>, issues: string[]): string | undefined {
  if (!Object.hasOwn(obj, key)) {
    issues.push(`missing "${key}"`);
    return undefined;
  }
  const r = schema.safeParse(obj[key]);
  if (!r.success) {
    issues.push(`"${key}": ${r.error.issues.map(i => i.message).join(', ')}`);
    return undefined;
  }
  return r.data;
}

/**
 * Parse raw file content into a record
 * @param file - Used for error messages only
 * @throws RecordParseError | RecordValidationError
 */
export function parseRecord(file: string, raw: string, fields: RecordFields = DEFAULT_FIELDS): CipherRecord {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new RecordParseError(file, err instanceof Error ? err.message : String(err));
  }

  const obj = RecordObject.safeParse(json);
  if (!obj.success) throw new RecordValidationError(file, ['expected a JSON object']);

  const issues: string[] = [];
  const ciphertext = readField(obj.data, fields.cipherField, CipherText, issues);
  const plaintext = readField(obj.data, fields.plainField, PlainText, issues);
  if (ciphertext === undefined || plaintext === undefined) throw new RecordValidationError(file, issues);

  return { ciphertext, plaintext };
}

export function readRecordFile(file: string, fields: RecordFields = DEFAULT_FIELDS): CipherRecord {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new StorageError('read', file, err);
  }
  return parseRecord(file, raw, fields);
}
