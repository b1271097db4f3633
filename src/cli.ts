#!/usr/bin/env node

import { resolve } from "node:path";
import { Command } from "commander";
import { parseBookedInPdf } from "./booked-in-parse.ts";
import {
  type BookedInReportJson,
  convertBookedInPdf,
  serializeReport,
  toReportJson,
  writeReportFile,
} from "./booked-in-report.ts";
import { loadReportConfig, parseBookedDay } from "./config.ts";
import { buildBookedInUrl, fetchBookedInPdf } from "./report-fetch.ts";

interface OutputOptions {
  output?: string;
  stats?: boolean;
}

interface FetchOptions extends OutputOptions {
  day?: string;
  baseUrl?: string;
}

const program = new Command();

program
  .name("booked-in")
  .description("Reconstruct booking records from booked-in jail report PDFs")
  .showHelpAfterError();

program
  .command("parse")
  .description("Parse a local booked-in report PDF into JSON booking records")
  .argument("<pdfPath>", "Path to input PDF file")
  .option("-o, --output <jsonPath>", "Write JSON to this file instead of stdout")
  .option("--stats", "Include charge mix and city statistics")
  .action(async (pdfPath: string, options: OutputOptions) => {
    const conversion = await convertBookedInPdf({
      inputPdfPath: pdfPath,
      outputJsonPath: options.output,
      includeStats: options.stats,
    });

    if (conversion.outputJsonPath) {
      console.log(
        `Parsed ${conversion.report.records.length} booking record(s) into ${conversion.outputJsonPath}`,
      );
    } else {
      process.stdout.write(serializeReport(conversion.report));
    }
  });

program
  .command("fetch")
  .description("Download a day's booked-in report and parse it into JSON booking records")
  .option("-d, --day <dd>", "Day number of the report file (defaults to BOOKED_DAY)")
  .option("--base-url <url>", "Report directory URL (defaults to BOOKED_BASE_URL)")
  .option("-o, --output <jsonPath>", "Write JSON to this file instead of stdout")
  .option("--stats", "Include charge mix and city statistics")
  .action(async (options: FetchOptions) => {
    const config = loadReportConfig();
    const day = options.day ? parseBookedDay(options.day) : config.bookedDay;
    const url = buildBookedInUrl(options.baseUrl ?? config.bookedBaseUrl, day);

    console.error(`Fetching booked-in report from ${url}...`);
    const data = await fetchBookedInPdf(url);
    const report = toReportJson(await parseBookedInPdf(data), options.stats ?? false);
    await emitReport(report, options.output);
  });

program.action(() => {
  program.outputHelp();
});

async function emitReport(report: BookedInReportJson, outputPath: string | undefined): Promise<void> {
  if (!outputPath) {
    process.stdout.write(serializeReport(report));
    return;
  }
  const resolvedOutputPath = resolve(outputPath);
  await writeReportFile(resolvedOutputPath, serializeReport(report));
  console.log(`Parsed ${report.records.length} booking record(s) into ${resolvedOutputPath}`);
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
