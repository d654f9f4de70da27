import { v4 as uuidv4 } from 'uuid';

export function generateUUID(): string {
  return uuidv4();
}

/** UTC calendar day as YYYYMMDD. */
export function orderDayKey(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * Human-readable order number, e.g. ORD-20241210-0001. The sequence restarts each UTC day.
 */
export function formatOrderNumber(date: Date, sequence: number): string {
  return `ORD-${orderDayKey(date)}-${String(sequence).padStart(4, '0')}`;
}
