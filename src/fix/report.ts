import type { FixReport } from "./types.js";

export function formatReport(report: FixReport): string[] {
  const lines: string[] = [];
  if (report.succeeded.length > 0) {
    lines.push(`Fixed ${report.succeeded.length} file(s):`);
    for (const result of report.succeeded) {
      lines.push(`  ${result.sourcePath} -> ${result.targetPath}`);
    }
  }
  if (report.failed.length > 0) {
    lines.push(`Failed to fix ${report.failed.length} file(s):`);
    for (const result of report.failed) {
      lines.push(`  ${result.sourcePath}`);
    }
  }
  return lines;
}
