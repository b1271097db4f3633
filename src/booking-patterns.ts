export const STATE_CODE = "TX";

const NAME_PATTERN_SOURCE = "[A-Z][A-Z' \\-]+,\\s*[A-Z0-9][A-Z0-9' \\-]+";
const IDENTIFIER_PATTERN_SOURCE = "\\d{6,7}";
const DATE_PATTERN_SOURCE = "\\d{1,2}/\\d{1,2}/\\d{4}";
const POSTAL_CODE_PATTERN_SOURCE = "\\d{5}(?:-\\d{4})?";
const CITY_PATTERN_SOURCE = "[A-Z][A-Z \\-']+";
// Any two-letter state; charge cleanup strips out-of-state addresses too.
const STATE_TOKEN_PATTERN_SOURCE = "[A-Z]{2}";

export const STREET_SUFFIXES = [
  "AVE", "AV", "ST", "DR", "RD", "LN", "BLVD", "CT", "CIR", "PKWY", "HWY", "TER", "PL", "WAY",
  "TRL", "LOOP", "FWY", "SQ", "PARK", "RUN", "HOLW", "HOLLOW", "ROW", "PT", "PIKE", "CV", "COVE",
];

const NAME_IDENTIFIER_DATE_PATTERN = new RegExp(
  `^(${NAME_PATTERN_SOURCE})\\s+(${IDENTIFIER_PATTERN_SOURCE})\\s+(${DATE_PATTERN_SOURCE})$`,
);
const IDENTIFIER_DATE_ONLY_PATTERN = new RegExp(
  `^(${IDENTIFIER_PATTERN_SOURCE})\\s+(${DATE_PATTERN_SOURCE})$`,
);
const NAME_ONLY_PATTERN = new RegExp(`^${NAME_PATTERN_SOURCE}$`);
const BOOKING_NUMBER_PATTERN = /\b\d{2}-\d{7}\b/g;

export const CITY_STATE_POSTAL_PATTERN = new RegExp(
  `^(${CITY_PATTERN_SOURCE})\\s+${STATE_CODE}\\s+(${POSTAL_CODE_PATTERN_SOURCE})$`,
);
export const CITY_STATE_PATTERN = new RegExp(
  `^(${CITY_PATTERN_SOURCE})\\s+${STATE_CODE}(?:\\s+${POSTAL_CODE_PATTERN_SOURCE})?$`,
);
export const TRAILING_CITY_STATE_POSTAL_PATTERN = new RegExp(
  `\\s+${CITY_PATTERN_SOURCE}\\s+${STATE_TOKEN_PATTERN_SOURCE}\\s+${POSTAL_CODE_PATTERN_SOURCE}\\s*$`,
);
export const TRAILING_STATE_POSTAL_PATTERN = new RegExp(
  `(?:^|\\s+)${STATE_TOKEN_PATTERN_SOURCE}\\s+${POSTAL_CODE_PATTERN_SOURCE}\\s*$`,
);
export const EMBEDDED_STATE_POSTAL_PATTERN = new RegExp(
  `(?:^|\\s+)${STATE_TOKEN_PATTERN_SOURCE}\\s+${POSTAL_CODE_PATTERN_SOURCE}(?:\\s+|$)`,
  "g",
);
export const LINE_END_CITY_STATE_POSTAL_PATTERN = new RegExp(
  `(${CITY_PATTERN_SOURCE})\\s+${STATE_CODE}\\s+${POSTAL_CODE_PATTERN_SOURCE}$`,
);
export const INLINE_CITY_STATE_POSTAL_PATTERN = new RegExp(
  `\\b(${CITY_PATTERN_SOURCE}),?\\s+${STATE_CODE}\\s+${POSTAL_CODE_PATTERN_SOURCE}\\b`,
);

const STREET_SUFFIX_PATTERN = new RegExp(`\\b(?:${STREET_SUFFIXES.join("|")})\\b`);
const LEADING_STREET_NUMBER_PATTERN = /^\d{1,6}\s+/;

export interface RecordHeader {
  name: string;
  identifier: string;
  bookInDate: string;
}

export interface IdentifierDate {
  identifier: string;
  bookInDate: string;
}

export interface BookingAnchor {
  text: string;
  start: number;
  end: number;
}

export function matchNameIdentifierDate(line: string): RecordHeader | undefined {
  const match = NAME_IDENTIFIER_DATE_PATTERN.exec(line);
  if (!match) return undefined;
  return { name: match[1].trim(), identifier: match[2], bookInDate: match[3] };
}

export function matchIdentifierDateOnly(line: string): IdentifierDate | undefined {
  const match = IDENTIFIER_DATE_ONLY_PATTERN.exec(line);
  if (!match) return undefined;
  return { identifier: match[1], bookInDate: match[2] };
}

export function matchNameOnly(line: string): boolean {
  return NAME_ONLY_PATTERN.test(line);
}

export function findBookingAnchors(line: string): BookingAnchor[] {
  return [...line.matchAll(BOOKING_NUMBER_PATTERN)].map((match) => {
    const start = match.index ?? 0;
    return { text: match[0], start, end: start + match[0].length };
  });
}

export function looksLikeAddress(line: string): boolean {
  const upper = line.trim().toUpperCase();
  if (upper.length === 0) return false;
  if (CITY_STATE_POSTAL_PATTERN.test(upper) || CITY_STATE_PATTERN.test(upper)) return true;
  if (LEADING_STREET_NUMBER_PATTERN.test(upper)) return true;
  return STREET_SUFFIX_PATTERN.test(upper);
}

/**
 * The name pattern tolerates digits and hyphens after the comma, so a booking
 * number and its charge can ride along on a name line. Everything from the
 * first booking number on is returned as `remainder`.
 */
export function splitNameAtBookingAnchor(name: string): { name: string; remainder: string } {
  const [anchor] = findBookingAnchors(name);
  if (!anchor || anchor.start === 0) return { name: name.trim(), remainder: "" };
  return {
    name: name.slice(0, anchor.start).trim(),
    remainder: name.slice(anchor.start).trim(),
  };
}
