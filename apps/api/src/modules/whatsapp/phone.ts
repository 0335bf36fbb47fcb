export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Normalizes a free-form phone number to "+<digits>".
 *
 * Every non-digit is dropped. A bare 10-digit national number that does not
 * already start with `defaultCountryCode` gets the country code prepended.
 * This is a heuristic, not E.164 validation: an 11+ digit number is assumed
 * to carry its own country code.
 *
 * @example normalizePhone("333 123 4567")      // "+393331234567"
 * @example normalizePhone("+1 (555) 123-4567") // "+15551234567"
 */
export function normalizePhone(raw: string, defaultCountryCode = "39"): string {
  if (raw.trim() === "") {
    throw new InvalidInputError("Phone number is required");
  }

  const digits = raw.replace(/\D/g, "");
  if (digits === "") {
    throw new InvalidInputError(`Phone number "${raw}" contains no digits`);
  }

  const national = digits.length === 10 && !digits.startsWith(defaultCountryCode);
  return `+${national ? defaultCountryCode + digits : digits}`;
}
