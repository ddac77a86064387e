import type { RawCellValue } from './types';

/**
 * Converts one raw cell value into trimmed, non-empty text, or `undefined`
 * when the cell carries nothing to extract.
 */
export function normalizeCell(value: RawCellValue | undefined): string | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (typeof value === 'number') {
    if (!Number.isFinite(value)) return undefined;
    text = String(value);
  } else if (typeof value === 'boolean') {
    text = value ? 'TRUE' : 'FALSE';
  } else {
    if (isNaN(value.getTime())) return undefined;
    text = value.toISOString();
  }

  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
