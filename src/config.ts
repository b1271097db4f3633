export const DEFAULT_BOOKED_BASE_URL =
  "https://cjreports.tarrantcounty.com/Reports/JailedInmates/FinalPDF";
export const DEFAULT_BOOKED_DAY = "01";

const BOOKED_DAY_PATTERN = /^\d{1,2}$/;

export interface ReportConfig {
  bookedBaseUrl: string;
  bookedDay: string;
}

type Environment = Record<string, string | undefined>;

export function loadReportConfig(env: Environment = process.env): ReportConfig {
  return {
    bookedBaseUrl: readNonEmpty(env.BOOKED_BASE_URL) ?? DEFAULT_BOOKED_BASE_URL,
    bookedDay: parseBookedDay(readNonEmpty(env.BOOKED_DAY) ?? DEFAULT_BOOKED_DAY),
  };
}

export function parseBookedDay(value: string): string {
  const day = value.trim();
  if (!BOOKED_DAY_PATTERN.test(day)) {
    throw new Error(`Invalid booked-in report day: "${value}". Expected one or two digits.`);
  }
  return day;
}

function readNonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}
