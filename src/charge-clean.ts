import {
  EMBEDDED_STATE_POSTAL_PATTERN,
  TRAILING_CITY_STATE_POSTAL_PATTERN,
  TRAILING_STATE_POSTAL_PATTERN,
} from "./booking-patterns.ts";
import { isJunkLine, normalizeSpacing } from "./line-normalize.ts";

const INLINE_STREET_SUFFIXES = [
  "AVE", "AV", "ST", "DR", "RD", "LN", "BLVD", "CT", "CIR", "PKWY", "HWY", "TER", "PL", "WAY",
  "TRL", "LOOP", "FWY", "SQ", "CV", "COVE",
];

// Leading whitespace is required so a charge that starts with a number is left alone.
const INLINE_STREET_ADDRESS_PATTERN = new RegExp(
  `\\s+\\d{1,6}\\s+[A-Z0-9][A-Z0-9 \\-']{1,40}\\s+(?:${INLINE_STREET_SUFFIXES.join("|")})\\b.*$`,
);

/**
 * Reduces a raw charge fragment to charge text only, stripping any street,
 * city, state or postal code tail that bled in from the address column.
 * Returns an empty string for boilerplate or when nothing is left.
 */
export function cleanChargeText(raw: string): string {
  let text = normalizeSpacing(raw);

  for (;;) {
    if (isJunkLine(text)) return "";
    const stripped = normalizeSpacing(stripAddressTail(text));
    if (stripped === text) return text;
    text = stripped;
  }
}

function stripAddressTail(text: string): string {
  const withoutStreet = text.replace(INLINE_STREET_ADDRESS_PATTERN, "").trim();
  const withoutCity = withoutStreet.replace(TRAILING_CITY_STATE_POSTAL_PATTERN, "").trim();
  const withoutState =
    withoutCity === withoutStreet
      ? withoutStreet.replace(TRAILING_STATE_POSTAL_PATTERN, "").trim()
      : withoutCity;
  return withoutState.replace(EMBEDDED_STATE_POSTAL_PATTERN, " ");
}
