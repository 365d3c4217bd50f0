/**
 * UUID validation for path ids, so malformed ids never reach a query.
 */

import { ValidationError } from '@/lib/errors';

// Any RFC 4122 version; ids are generated by gen_random_uuid() but imported
// rows may carry other versions
const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function isValidUUID(id: string): boolean {
  if (!id || typeof id !== 'string') return false;
  return UUID_REGEX.test(id);
}

/**
 * @throws ValidationError "Invalid <fieldName> format"
 */
export function validateId(id: string, fieldName: string = 'id'): string {
  if (!isValidUUID(id)) {
    throw new ValidationError(`Invalid ${fieldName} format`);
  }
  return id;
}
