/**
 * Requirements addressed:
 * - Content digests are SHA-256 hex (node:crypto) over file bytes or over a
 *   stable serialization of configuration values.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

import type { JsonValue } from '../types';
import { stableStringify } from './stableStringify';

export const sha256Hex = (data: string | Uint8Array): string =>
  createHash('sha256').update(data).digest('hex');

export const digestJson = (value: JsonValue): string =>
  sha256Hex(stableStringify(value));

export const hashFileSha256 = async (absPath: string): Promise<string> => {
  const h = createHash('sha256');

  await new Promise<void>((resolve, reject) => {
    const stream = createReadStream(absPath);
    stream.on('data', (chunk) => h.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => {
      resolve();
    });
  });

  return h.digest('hex');
};
