/**
 * E.164 formatting: keeps the digits, assumes a US number when exactly ten
 * remain, and prefixes "+". Other lengths are passed through unchecked.
 */
export function formatPhoneNumber(input: string): string {
  let digits = input.replace(/\D/g, "");
  if (digits.length === 10) digits = `1${digits}`;
  return `+${digits}`;
}
