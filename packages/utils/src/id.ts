import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique identifier, optionally prefixed (`rpt_3f2a…`).
 */
export function generateId(prefix?: string): string {
  const id = uuidv4().replace(/-/g, '');
  return prefix ? `${prefix}_${id}` : id;
}
