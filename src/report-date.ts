const REPORT_DATE_PATTERN = /(\d{1,2})\/(\d{1,2})\/(\d{4})/g;

/**
 * First real `M/D/YYYY` date in the first page's text, or `now` when the page
 * carries none. A match such as `13/45/2026` is skipped rather than rolled over.
 */
export function extractReportDate(firstPageText: string, now: Date = new Date()): Date {
  for (const match of firstPageText.matchAll(REPORT_DATE_PATTERN)) {
    const date = toCalendarDate(Number(match[3]), Number(match[1]), Number(match[2]));
    if (date) return date;
  }
  return now;
}

export function formatReportDate(date: Date): string {
  return `${date.getMonth() + 1}/${date.getDate()}/${date.getFullYear()}`;
}

function toCalendarDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return undefined;
  }
  return date;
}
