import { renderCsv } from './csv.js';
import { renderJson } from './json.js';
import { renderPrometheus } from './prometheus.js';
import { renderTable } from './table.js';
import type { HostScanResult } from '../types/scan.js';

export const OUTPUT_FORMATS = ['table', 'json', 'csv', 'prometheus'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface RenderOptions {
  colors?: boolean | undefined;
  now?: Date | undefined;
}

export function renderReport(
  format: OutputFormat,
  results: readonly HostScanResult[],
  totalDurationMs: number,
  options: RenderOptions = {}
): string {
  const now = options.now ?? new Date();
  switch (format) {
    case 'json':
      return renderJson(results, totalDurationMs, now);
    case 'csv':
      return renderCsv(results);
    case 'prometheus':
      return renderPrometheus(results, now.getTime());
    case 'table':
      return renderTable(results, totalDurationMs, { colors: options.colors });
  }
}

export { renderTable, type TableReportOptions } from './table.js';
export { renderJson, buildMultiHostReport } from './json.js';
export { renderCsv, escapeCsvField, CSV_COLUMNS } from './csv.js';
export { renderPrometheus } from './prometheus.js';
