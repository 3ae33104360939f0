import { writeFile, readFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join, dirname } from 'path';
import dayjs from 'dayjs';
import { Logger } from '../utils/logger.js';
import { config } from '../config/index.js';

export interface RunEntry {
  command: string;
  /** Epoch milliseconds. */
  startedAt: number;
  finishedAt: number;
  stopReason: string;
  processed: number;
  succeeded: number;
  failed: number;
  /** Ledger written by the run. */
  output: string;
}

interface DailyTotals {
  runs: number;
  processed: number;
  succeeded: number;
  failed: number;
}

const RUNS_HEADING = '## Runs';

/**
 * Appends one table row per pipeline run to a daily markdown file under
 * `<basePath>/YYYY/MM/YYYY-MM-DD-runs.md` and keeps the day's totals current.
 */
export class RunJournalService {
  constructor(
    private readonly basePath: string = config.journal.basePath,
    private readonly enabled: boolean = config.journal.enabled
  ) {}

  getJournalFilePath(date: dayjs.Dayjs): string {
    const year = date.format('YYYY');
    const month = date.format('MM');
    return join(this.basePath, year, month, `${date.format('YYYY-MM-DD')}-runs.md`);
  }

  /** Returns the journal file written, null when disabled or on failure. */
  async record(entry: RunEntry): Promise<string | null> {
    if (!this.enabled) {
      return null;
    }

    const finished = dayjs(entry.finishedAt);
    const journalPath = this.getJournalFilePath(finished);

    try {
      await this.ensureDirectoryExists(dirname(journalPath));

      let content = await this.getOrCreateFileContent(journalPath, finished);
      if (!content.endsWith('\n')) content += '\n';
      content += this.formatAsTableRow(entry);

      const totals = this.computeTotals(content);
      content = this.updateTotals(content, totals);
      content = content.replace(/- \*\*Last Updated\*\*: .*/, `- **Last Updated**: ${finished.format('YYYY-MM-DD HH:mm:ss')}`);

      await writeFile(journalPath, content, 'utf8');
      Logger.debug(`Journaled ${entry.command} run`, { journal: journalPath, totals });
      return journalPath;
    } catch (error) {
      Logger.error('Failed to write run journal', {
        journal: journalPath,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return null;
    }
  }

  private async ensureDirectoryExists(dirPath: string): Promise<void> {
    if (!existsSync(dirPath)) {
      await mkdir(dirPath, { recursive: true });
    }
  }

  private async getOrCreateFileContent(filePath: string, date: dayjs.Dayjs): Promise<string> {
    if (existsSync(filePath)) {
      try {
        return await readFile(filePath, 'utf8');
      } catch (error) {
        Logger.warn(`Could not read existing journal file: ${filePath}`, {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      }
    }

    return this.createFileTemplate(date);
  }

  private createFileTemplate(date: dayjs.Dayjs): string {
    const dateStr = date.format('YYYY-MM-DD');
    const dayName = date.format('dddd');

    return `---
title: "trackvault runs - ${dateStr}"
date: "${dateStr}"
tags:
  - trackvault
  - music-library
type: "daily-runs"
---

# Pipeline Runs - ${dayName}, ${date.format('MMMM D, YYYY')}

## Summary

- **Date**: ${dateStr}
- **Day**: ${dayName}
- **Journal Created**: ${date.format('YYYY-MM-DD HH:mm:ss')}
- **Last Updated**: ${date.format('YYYY-MM-DD HH:mm:ss')}

## Daily Totals

| Metric | Count |
|--------|-------|
| Runs | 0 |
| Processed | 0 |
| Succeeded | 0 |
| Failed | 0 |

${RUNS_HEADING}

| Start | Command | Duration | Stop Reason | Processed | Succeeded | Failed | Output |
|-------|---------|----------|-------------|-----------|-----------|--------|--------|
`;
  }

  private formatAsTableRow(entry: RunEntry): string {
    const escapeTableCell = (text: string): string => {
      if (!text) return '-';
      return text.replace(/\|/g, '\\|');
    };

    const minutes = Math.max(0, entry.finishedAt - entry.startedAt) / 60000;
    return `| ${dayjs(entry.startedAt).format('HH:mm:ss')} | ${escapeTableCell(entry.command)} | ${minutes.toFixed(1)} min | ${escapeTableCell(entry.stopReason)} | ${entry.processed} | ${entry.succeeded} | ${entry.failed} | ${escapeTableCell(entry.output)} |\n`;
  }

  /** Sums the numeric columns of every row in the runs table. */
  private computeTotals(content: string): DailyTotals {
    const totals: DailyTotals = { runs: 0, processed: 0, succeeded: 0, failed: 0 };
    const runsIndex = content.indexOf(RUNS_HEADING);
    if (runsIndex === -1) {
      return totals;
    }

    const lines = content.substring(runsIndex).split('\n');
    for (const line of lines) {
      if (!line.startsWith('|') || line.startsWith('|--') || line.startsWith('| Start |')) continue;

      const cells = line.split(/(?<!\\)\|/).map((cell) => cell.trim());
      // ['', start, command, duration, reason, processed, succeeded, failed, output, '']
      if (cells.length < 10) continue;

      totals.runs++;
      totals.processed += parseInt(cells[5], 10) || 0;
      totals.succeeded += parseInt(cells[6], 10) || 0;
      totals.failed += parseInt(cells[7], 10) || 0;
    }
    return totals;
  }

  private updateTotals(content: string, totals: DailyTotals): string {
    return content.replace(
      /\| Runs \| \d+ \|\n\| Processed \| \d+ \|\n\| Succeeded \| \d+ \|\n\| Failed \| \d+ \|/,
      `| Runs | ${totals.runs} |\n| Processed | ${totals.processed} |\n| Succeeded | ${totals.succeeded} |\n| Failed | ${totals.failed} |`
    );
  }
}
