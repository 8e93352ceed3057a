import { toInstant } from './pipeline/coerce.js';
import type { Instant } from './pipeline/instant.js';

export function instantAt(text: string): Instant {
  const instant = toInstant(text);
  if (!instant) {
    throw new Error(`not an instant: ${text}`);
  }
  return instant;
}
