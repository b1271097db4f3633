import {
  CITY_STATE_PATTERN,
  CITY_STATE_POSTAL_PATTERN,
  INLINE_CITY_STATE_POSTAL_PATTERN,
  LINE_END_CITY_STATE_POSTAL_PATTERN,
} from "./booking-patterns.ts";
import { normalizeSpacing } from "./line-normalize.ts";

export const UNKNOWN_CITY = "Unknown";

/**
 * Picks the city from a record's address lines. Whole-line `CITY TX ZIP`
 * beats whole-line `CITY TX`, which beats a city found inside a longer line;
 * within a tier the first matching line wins.
 */
export function extractCity(addressLines: readonly string[]): string {
  const upperLines = addressLines.map((line) => normalizeSpacing(line).toUpperCase());

  for (const line of upperLines) {
    const match = CITY_STATE_POSTAL_PATTERN.exec(line);
    if (match) return formatCity(match[1]);
  }

  for (const line of upperLines) {
    const match = CITY_STATE_PATTERN.exec(line);
    if (match) return formatCity(match[1]);
  }

  for (const line of upperLines) {
    const match =
      LINE_END_CITY_STATE_POSTAL_PATTERN.exec(line) ?? INLINE_CITY_STATE_POSTAL_PATTERN.exec(line);
    if (match) return formatCity(match[1]);
  }

  return UNKNOWN_CITY;
}

export function toTitleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_, boundary: string, letter: string) =>
    `${boundary}${letter.toUpperCase()}`,
  );
}

function formatCity(city: string): string {
  return normalizeSpacing(toTitleCase(city));
}
