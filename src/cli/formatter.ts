/**
 * REASON Output Formatter
 *
 * Formats analysis runs, store documents and errors for CLI output.
 */

import { ErrorHandler } from '../errors/index.js';
import type { PublicationRecord } from '../knowledge/index.js';
import type { AnalysisRun } from '../pipeline/index.js';
import type { CacheStats, JsonObject } from '../storage/index.js';

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number | undefined): string {
  if (value === undefined) return '';
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

export class OutputFormatter {
  /**
   * Format a completed analysis run with its findings and artifact paths.
   */
  formatAnalysisRun(run: AnalysisRun): string {
    const { result } = run;
    const lines: string[] = [header(`Analysis: ${result.disease}`)];
    lines.push(field('Level', result.analysis_level));
    lines.push(field('Timestamp', result.timestamp));
    if (result.data_sources.length) {
      lines.push(field('Data sources', result.data_sources.join(', ')));
    }
    lines.push(field('Pathways', result.results.pathways.join(', ')));
    lines.push(field('Targets', result.results.targets.join(', ')));
    lines.push(field('Drug candidates', result.results.drugs.join(', ')));
    for (const ds of result.results.datasets) {
      const note = ds.error ? `${ds.status} (${ds.error})` : ds.status;
      lines.push(field(`Dataset ${ds.source}`, note));
    }
    if (result.simulation) {
      lines.push(field('Simulation', `${result.simulation.status} in ${result.simulation.simulation_time.toFixed(1)}s`));
    }
    if (result.validation_score !== undefined) {
      lines.push(field('Validation score', result.validation_score.toFixed(2)));
    }
    lines.push(field('Result file', run.resultFile));
    lines.push(field('Summary file', run.summaryFile));
    return lines.filter(Boolean).join('\n');
  }

  /**
   * Pretty-print a stored or synthesized document, flagging placeholders.
   */
  formatDocument(title: string, doc: JsonObject): string {
    const marker = doc.is_placeholder === true ? ` ${YELLOW}(placeholder)${RESET}` : '';
    return `${header(title)}${marker}\n${JSON.stringify(doc, null, 2)}`;
  }

  formatPublications(query: string, pubs: PublicationRecord[]): string {
    if (!pubs.length) {
      return `${YELLOW}No publications found.${RESET}`;
    }
    const lines: string[] = [header(`Literature for "${query}" (${pubs.length})`)];
    pubs.forEach((p, i) => {
      lines.push(`  ${DIM}${String(i + 1).padStart(3)}.${RESET} ${BOLD}${p.title}${RESET}`);
      lines.push(`       ${DIM}${p.id} | ${p.journal} | ${p.year}${RESET}`);
    });
    return lines.join('\n');
  }

  formatCacheStats(label: string, stats: CacheStats): string {
    return [
      header(`${label} cache`),
      field('Entries', stats.entryCount),
      field('Hits', stats.hits),
      field('Misses', stats.misses),
      field('Hit rate', `${(stats.hitRate * 100).toFixed(0)}%`),
    ].join('\n');
  }

  /**
   * Format an error into a message with a hint for common causes.
   */
  formatError(error: unknown): string {
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`];

    const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
    if (msg.includes('enoent') || msg.includes('no such file')) {
      lines.push(`${YELLOW}Hint:${RESET} The specified file or path does not exist. Check the path and try again.`);
    } else if (msg.includes('eacces') || msg.includes('permission denied')) {
      lines.push(`${YELLOW}Hint:${RESET} Permission denied. Check the permissions of the data and results directories.`);
    }

    return lines.join('\n');
  }
}
