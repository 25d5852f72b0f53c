/**
 * Parses a displayed price into a number.
 *
 * Handles both European (1.234,56) and US (1,234.56) formats: when both
 * separators appear the right-most one is the decimal point; a lone comma
 * is decimal only when exactly two digits follow it.
 */
export function parsePrice(text: string | number | null | undefined): number | null {
  if (typeof text === 'number') {
    return Number.isFinite(text) ? text : null;
  }
  if (!text) return null;

  // Remove currency symbols, letters and whitespace
  const cleaned = text
    .replace(/[^\d.,\s]/g, '')
    .trim()
    .replace(/\s+/g, '');

  if (!/\d/.test(cleaned)) return null;

  let normalized: string;

  if (cleaned.includes(',') && cleaned.includes('.')) {
    if (cleaned.lastIndexOf(',') > cleaned.lastIndexOf('.')) {
      // 1.234,56
      normalized = cleaned.replace(/\./g, '').replace(',', '.');
    } else {
      // 1,234.56
      normalized = cleaned.replace(/,/g, '');
    }
  } else if (cleaned.includes(',')) {
    const parts = cleaned.split(',');

    if (parts.length === 2 && parts[1].length === 2) {
      // 12,99
      normalized = cleaned.replace(',', '.');
    } else {
      // 1,234 or 1,234,567
      normalized = cleaned.replace(/,/g, '');
    }
  } else {
    normalized = cleaned;
  }

  const price = parseFloat(normalized);
  return isNaN(price) ? null : price;
}
