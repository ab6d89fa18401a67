import { createHash } from 'crypto';

// Literal backslash-r-backslash-n, not CR LF.
export const SIGNATURE_SEPARATOR = '\\r\\n';

export function sign(path: string, token: string, timestampMillis: number): string {
  const input = [path, token, String(timestampMillis)].join(SIGNATURE_SEPARATOR);
  return createHash('md5').update(Buffer.from(input, 'utf8')).digest('hex');
}
