const JUNK_SUBSTRINGS = [
  "INMATES BOOKED IN DURING THE PAST",
  "REPORT DATE:",
  "PAGE:",
  "INMATE NAME IDENTIFIER",
  // Also matches ACCIDENT, INCIDENT and HOMICIDE, so those charge lines are dropped.
  "CID",
  "BOOK IN DATE",
  "BOOKING NO.",
  "DESCRIPTION",
];

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Report title, column headers and pagination. Empty lines count as junk too. */
export function isJunkLine(line: string): boolean {
  const upper = line.trim().toUpperCase();
  if (upper.length === 0) return true;
  return JUNK_SUBSTRINGS.some((substring) => upper.includes(substring));
}
