/**
 * Splits one CSV line into fields.
 *
 * A `"` toggles the in-quotes state and is dropped; a `,` outside quotes ends the field.
 * Doubled quotes inside a quoted field are not collapsed into one: both characters toggle
 * the state and both are dropped. The result always has one more field than there are
 * unquoted commas.
 *
 * @example
 * ```typescript
 * splitLine('Coffee,"$1,200.00",Food');
 * // Returns: ['Coffee', '$1,200.00', 'Food']
 * ```
 */
export function splitLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;
  for (const c of line) {
    if (c === '"') {
      inQuotes = !inQuotes;
    } else if (c === ',' && !inQuotes) {
      fields.push(current);
      current = '';
    } else {
      current += c;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Makes a value safe to write as one CSV field. Values without a comma, quote or newline
 * are returned unchanged; anything else has its quotes doubled and is wrapped in quotes.
 */
export function escapeField(value: string): string {
  if (!/[,"\n\r]/.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Escapes each field and joins them into one CSV line (without the line ending).
 */
export function joinLine(fields: string[]): string {
  return fields.map(escapeField).join(',');
}

/**
 * Parses a currency string such as `$1,234.56` into a number.
 *
 * Returns 0 for empty input and for anything that is not a finite number once `$` and `,`
 * are removed.
 */
export function parseAmount(text: string | null | undefined): number {
  if (text === null || text === undefined) {
    return 0;
  }
  const clean = text.replace(/[$,]/g, '').trim();
  if (clean === '') {
    return 0;
  }
  const value = Number(clean);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Formats a number as a dollar amount with two decimals (`$12.50`, `-$3.00`).
 */
export function formatAmount(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  const sign = rounded < 0 ? '-' : '';
  return `${sign}$${Math.abs(rounded).toFixed(2)}`;
}
