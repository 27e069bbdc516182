/**
 * UUID generation utility
 *
 * Single seam for identifiers so tests can mock it.
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a UUID v4 string
 *
 * @returns A random UUID v4 string
 */
export function generateUUID(): string {
  return uuidv4();
}
