import { randomUUID } from 'node:crypto';

/**
 * Generuje unikátní ID (correlation ID, audit záznamy).
 */
export function generateId(): string {
  return randomUUID();
}
