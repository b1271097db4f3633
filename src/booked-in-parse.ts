import type { BookedInReport } from "./booking-types.ts";
import { collectPageLines } from "./text-lines.ts";
import { extractDocumentFromBuffer } from "./pdf-extract.ts";
import { assembleBookingRecords } from "./record-assembler.ts";
import { extractReportDate } from "./report-date.ts";

export interface ParseBookedInOptions {
  /** Report date used when the first page carries no date. */
  now?: Date;
}

export function parseBookedInPages(
  pages: readonly (readonly string[])[],
  options: ParseBookedInOptions = {},
): BookedInReport {
  const firstPageText = pages.length > 0 ? pages[0].join("\n") : "";
  const reportDate = extractReportDate(firstPageText, options.now ?? new Date());
  const records = assembleBookingRecords(pages.flat());
  return { reportDate, records };
}

export async function parseBookedInPdf(
  data: Uint8Array,
  options: ParseBookedInOptions = {},
): Promise<BookedInReport> {
  const document = await extractDocumentFromBuffer(data);
  return parseBookedInPages(collectPageLines(document), options);
}
