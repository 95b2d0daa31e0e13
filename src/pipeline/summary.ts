/**
 * Plain-text summary written next to each analysis result.
 */

import type { AnalysisResult } from './types.js';

function bullets(items: string[]): string[] {
  return items.map((item) => `   - ${item}`);
}

export function formatSummary(result: AnalysisResult): string {
  const { pathways, targets, drugs } = result.results;
  const lines = [
    `REASON Analysis Summary for ${result.disease}`,
    `Date: ${result.timestamp}`,
    `Analysis Level: ${result.analysis_level}`,
    '',
    'Key Findings:',
    '1. Affected Pathways:',
    ...bullets(pathways),
    '',
    '2. Therapeutic Targets:',
    ...bullets(targets),
    '',
    '3. Potential Drug Candidates:',
    ...bullets(drugs),
  ];
  if (result.simulation) {
    lines.push('', `Simulation: ${result.simulation.status} (${result.simulation.simulation_time.toFixed(1)}s)`);
  }
  if (result.validation_score !== undefined) {
    lines.push('', `Validation Score: ${result.validation_score.toFixed(2)}`);
  }
  return lines.join('\n') + '\n';
}

/** `YYYYMMDD_HHMMSS` in local time. */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function resultIdFor(disease: string, timestamp: string): string {
  return `${disease.replaceAll(' ', '_')}_cycle1_${timestamp}`;
}

/** Per-run log file name, `reason_log_YYYYMMDD-HHMMSS.log` in local time. */
export function logFileNameFor(date: Date): string {
  return `reason_log_${formatTimestamp(date).replace('_', '-')}.log`;
}
