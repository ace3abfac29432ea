/**
 * Canonical 10-digit NANP number. A leading country code 1 is dropped;
 * anything that is not ten digits after that normalizes to ''.
 */
export function normalizePhone(raw: string): string {
  let digits = raw.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  return digits.length === 10 ? digits : '';
}
