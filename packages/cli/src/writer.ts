import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { ReportKind } from "@issueroll/core";

export const OUTPUT_DIR = "issueroll";

export interface WriteReportOptions {
  cwd: string;
  report: ReportKind;
  date: string;
  content: string;
  /** Explicit destination; skips the dated file and `latest.md`. */
  output?: string;
}

function sanitizeForFileName(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, "-");
}

export async function writeReportFiles(
  options: WriteReportOptions
): Promise<{ reportFile: string; latestFile?: string }> {
  if (options.output) {
    const reportFile = path.resolve(options.cwd, options.output);
    await mkdir(path.dirname(reportFile), { recursive: true });
    await writeFile(reportFile, options.content, "utf-8");
    return { reportFile };
  }

  const outputRoot = path.join(options.cwd, OUTPUT_DIR);
  const reportFile = path.join(outputRoot, `${options.report}-${sanitizeForFileName(options.date)}.md`);
  const latestFile = path.join(outputRoot, "latest.md");

  await mkdir(outputRoot, { recursive: true });
  await writeFile(reportFile, options.content, "utf-8");
  await writeFile(latestFile, options.content, "utf-8");

  return { reportFile, latestFile };
}
