import { createHash } from 'node:crypto';

/**
 * Chroma collection names: 3-63 chars of [A-Za-z0-9._-], starting and
 * ending with an alphanumeric character. A name that has to be altered gets
 * a short hash of the original appended.
 */
const INVALID_CHARS_RE = /[^A-Za-z0-9._-]+/g;
const EDGE_RE = /^[^A-Za-z0-9]+|[^A-Za-z0-9]+$/g;

const MIN_LENGTH = 3;
const MAX_LENGTH = 63;

const SUFFIX_LENGTH = 8;

export function sanitizeCollectionName(name: string): string {
  const cleaned = name.replace(INVALID_CHARS_RE, '_').replace(EDGE_RE, '');
  if (cleaned === name && name.length >= MIN_LENGTH && name.length <= MAX_LENGTH) return name;

  const suffix = createHash('sha256').update(name).digest('hex').slice(0, SUFFIX_LENGTH);
  const head = cleaned.slice(0, MAX_LENGTH - SUFFIX_LENGTH - 1).replace(EDGE_RE, '');
  return head ? `${head}_${suffix}` : suffix;
}
