/**
 * Members type their handle either as "name" or "@name"; only "name" is stored.
 * Blank input clears the handle. undefined (field not sent) stays undefined.
 */
export function normalizeTelegramUsername(value: string | null): string | null;
export function normalizeTelegramUsername(value: string | null | undefined): string | null | undefined;
export function normalizeTelegramUsername(value: string | null | undefined): string | null | undefined {
  if (value === undefined || value === null) return value;

  const trimmed = value.trim();
  if (!trimmed) return null;

  return trimmed.startsWith('@') ? trimmed.slice(1) : trimmed;
}
