import crypto from 'node:crypto';
import fs from 'node:fs';

export type DigestAlgorithm = 'sha256' | 'md5';

export function digestBuffer(bytes: Buffer, algorithm: DigestAlgorithm = 'sha256'): string {
  return crypto.createHash(algorithm).update(bytes).digest('hex');
}

export async function digestFile(filePath: string, algorithm: DigestAlgorithm = 'sha256'): Promise<string> {
  const hash = crypto.createHash(algorithm);
  for await (const chunk of fs.createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export function normalizeHex(value: string): string {
  return value.trim().toLowerCase();
}

export function isSha256Hex(value: string): boolean {
  return /^[a-f0-9]{64}$/i.test(value.trim());
}
