import { uuidv7 } from 'uuidv7';

export function generateId(): string {
  return uuidv7();
}

/**
 * Date → integer Unix timestamp in milliseconds. Chroma metadata has no datetime type.
 */
export function dateToTimestamp(date: Date): number {
  return date.getTime();
}

export function timestampToDate(ts: number): Date {
  return new Date(ts);
}
