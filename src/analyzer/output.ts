import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { FrozenReport } from './report.js';

/** Serialize a report as 2-space indented JSON */
export function serializeReport(report: FrozenReport): string {
  return JSON.stringify(report, null, 2);
}

/** Write the report to a JSON file, creating parent directories */
export function writeOutput(report: FrozenReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, serializeReport(report), 'utf-8');
}
