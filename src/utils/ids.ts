import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';

export function generateId(prefix?: string): string {
  const id = uuidv4();
  return prefix ? `${prefix}-${id}` : id;
}

export function contentId(prefix: string, content: string | Uint8Array): string {
  const digest = createHash('sha256').update(content).digest('hex');
  return `${prefix}-${digest.slice(0, 16)}`;
}
