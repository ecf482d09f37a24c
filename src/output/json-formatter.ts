import { mkdirSync, writeFileSync } from 'fs';
import * as path from 'path';
import { APP_VERSION } from '../config/constants';
import type { VerificationReport } from '../analysis/types';

export interface Result {
  metadata: {
    version: string;
    timestamp: string;
  };
  analysis: VerificationReport;
}

export class JsonFormatter {
  constructor(private readonly now: () => Date = () => new Date()) {}

  toResult(report: VerificationReport): Result {
    return {
      metadata: {
        version: APP_VERSION,
        timestamp: this.now().toISOString(),
      },
      analysis: report,
    };
  }

  toJson(report: VerificationReport): string {
    return JSON.stringify(this.toResult(report), null, 2);
  }
}

/**
 * Writes the report as pretty-printed JSON, creating parent directories.
 * Returns the absolute path written.
 */
export function writeJsonReport(
  outputPath: string,
  report: VerificationReport,
  formatter: JsonFormatter = new JsonFormatter()
): string {
  const fullPath = path.resolve(outputPath);
  mkdirSync(path.dirname(fullPath), { recursive: true });
  writeFileSync(fullPath, `${formatter.toJson(report)}\n`, 'utf-8');
  return fullPath;
}
