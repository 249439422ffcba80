import crypto from 'node:crypto';

export const hashContent = (content: string | Buffer): string =>
  crypto.createHash('sha256').update(content).digest('hex');
