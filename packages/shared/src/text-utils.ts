export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

export const normalizeCellLabel = (value: string): string =>
  normalizeWhitespace(value).toLowerCase();

export const isPositiveIntegerText = (value: string): boolean => /^\d+$/.test(value) && Number(value) > 0;
