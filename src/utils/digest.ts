import { createHash } from 'crypto';

export function sha256Digest(data: Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}
