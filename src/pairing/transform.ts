/**
 * Pairing transformations.
 */

/**
 * Keep only the digits of a PIN as typed by a user.
 *
 * @example
 * sanitizePin(" 12-34\n") // "1234"
 */
export const sanitizePin = (pin: string): string => pin.replace(/\D/g, "");
