import { nanoid } from 'nanoid';

/**
 * Generates a unique ID for documents and events.
 *
 * The ID format is "i" + nanoid(10): a letter prefix followed by a
 * 10-character URL-safe identifier, e.g. "iV1StGXR8_".
 */
export function generateId(): string {
  return 'i' + nanoid(10);
}
