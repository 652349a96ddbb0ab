import path from 'path';
import { v5 as uuidv5 } from 'uuid';

// Fixed namespace so placeholder ids stay stable across restarts.
const PLACEHOLDER_NAMESPACE = '6f1c2e4a-8d3b-5a7e-9c41-2b7d0e5f3a18';

/**
 * Maps a video filename (or path) to the stream id used as registry key and publish path.
 * The result only contains [a-z0-9_-] and is never empty.
 */
export function sanitizeStreamName(filename: string): string {
  const base = path.basename(filename);
  const stem = path.parse(base).name;

  const id = stem
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^a-zA-Z0-9_-]/g, '_')
    .toLowerCase()
    .replace(/_+/g, '_')
    .replace(/-+/g, '-')
    .replace(/^[_-]+|[_-]+$/g, '');

  if (id.length > 0) return id;

  const digest = uuidv5(base, PLACEHOLDER_NAMESPACE).replace(/-/g, '').slice(0, 8);
  return `stream-${digest}`;
}
