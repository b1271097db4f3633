import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parseBookedInPages } from "./booked-in-parse.ts";
import type { BookedInReport, BookingRecord } from "./booking-types.ts";
import { assertReadableFile, extractDocument } from "./pdf-extract.ts";
import type { ExtractedDocument } from "./pdf-types.ts";
import { formatReportDate } from "./report-date.ts";
import { analyzeBookings, type BookingStats } from "./report-stats.ts";
import { collectPageLines } from "./text-lines.ts";

export interface ConvertBookedInPdfInput {
  inputPdfPath: string;
  /** Written as JSON; omitted means the caller prints the result. */
  outputJsonPath?: string;
  includeStats?: boolean;
  now?: Date;
}

export interface BookedInReportJson {
  reportDate: string;
  records: BookingRecord[];
  stats?: BookingStats;
}

export interface ConvertBookedInPdfResult {
  report: BookedInReportJson;
  outputJsonPath?: string;
}

interface ConvertBookedInPdfDependencies {
  assertReadableFile: (filePath: string) => Promise<void>;
  extractDocument: (inputPdfPath: string) => Promise<ExtractedDocument>;
  writeOutput: (filePath: string, contents: string) => Promise<void>;
}

export async function convertBookedInPdf(
  input: ConvertBookedInPdfInput,
  dependencies?: ConvertBookedInPdfDependencies,
): Promise<ConvertBookedInPdfResult> {
  const resolvedDependencies = dependencies ?? createDefaultDependencies();
  const resolvedInputPdfPath = resolve(input.inputPdfPath);

  await resolvedDependencies.assertReadableFile(resolvedInputPdfPath);
  const document = await resolvedDependencies.extractDocument(resolvedInputPdfPath);
  const parsed = parseBookedInPages(collectPageLines(document), { now: input.now });
  const report = toReportJson(parsed, input.includeStats ?? false);

  if (!input.outputJsonPath) return { report };

  const resolvedOutputJsonPath = resolve(input.outputJsonPath);
  await resolvedDependencies.writeOutput(resolvedOutputJsonPath, serializeReport(report));
  return { report, outputJsonPath: resolvedOutputJsonPath };
}

export function toReportJson(report: BookedInReport, includeStats: boolean): BookedInReportJson {
  const json: BookedInReportJson = {
    reportDate: formatReportDate(report.reportDate),
    records: report.records,
  };
  if (includeStats) json.stats = analyzeBookings(report.records);
  return json;
}

export function serializeReport(report: BookedInReportJson): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

export async function writeReportFile(filePath: string, contents: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, contents, "utf8");
}

function createDefaultDependencies(): ConvertBookedInPdfDependencies {
  return {
    assertReadableFile,
    extractDocument,
    writeOutput: writeReportFile,
  };
}
