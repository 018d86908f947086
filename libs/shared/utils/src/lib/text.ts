import { LogStoreLimits, TRUNCATION_MARKER } from '@risk-router/shared/types';

/**
 * Cap free text at `maxLength` characters, appending the truncation marker when cut.
 */
export function truncateText(text: string, maxLength: number = LogStoreLimits.MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}${TRUNCATION_MARKER}`;
}

/**
 * Render an arbitrary tool/agent output as text (objects become JSON)
 */
export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function truncateValue(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  return truncateText(toText(value));
}
