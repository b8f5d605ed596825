/**
 * Derivation log entry structure
 */
export interface StageLogEntry {
  timestamp: string;
  stage: string;
  status: 'started' | 'success' | 'failed' | 'skipped';
  rows_written?: number;
  duration_ms?: number;
  failure_reason?: string;
}

export interface DerivationLoggerOptions {
  /** Max structured entries kept in memory */
  maxEntries?: number;
  /** Suppress console output (tests) */
  silent?: boolean;
}

/**
 * Console step logging plus structured, rotated stage entries behind the
 * end-of-run summary
 *
 * Console lines use the step markers of the ingestion scripts:
 * "→" doing, "✓" done, "⚠" warning, "✗" failure.
 */
export class DerivationLogger {
  private entries: StageLogEntry[];
  private maxEntries: number;
  private silent: boolean;

  constructor(options: DerivationLoggerOptions = {}) {
    this.entries = [];
    this.maxEntries = options.maxEntries ?? 10000;
    this.silent = options.silent ?? false;
  }

  step(message: string): void {
    this.print('log', `→ ${message}`);
  }

  done(message: string): void {
    this.print('log', `✓ ${message}`);
  }

  warn(message: string): void {
    this.print('warn', `⚠ ${message}`);
  }

  error(message: string): void {
    this.print('error', `✗ ${message}`);
  }

  info(message: string): void {
    this.print('log', message);
  }

  stageStarted(stage: string): void {
    this.addEntry({ timestamp: new Date().toISOString(), stage, status: 'started' });
    this.step(`Stage ${stage}`);
  }

  stageSucceeded(stage: string, rowsWritten: number, durationMs: number): void {
    this.addEntry({
      timestamp: new Date().toISOString(),
      stage,
      status: 'success',
      rows_written: rowsWritten,
      duration_ms: durationMs
    });
    this.done(`${stage}: ${rowsWritten} rows (${durationMs}ms)`);
  }

  stageFailed(stage: string, reason: string, durationMs: number): void {
    this.addEntry({
      timestamp: new Date().toISOString(),
      stage,
      status: 'failed',
      duration_ms: durationMs,
      failure_reason: reason
    });
    this.error(`${stage}: ${reason}`);
  }

  stageSkipped(stage: string, reason: string): void {
    this.addEntry({ timestamp: new Date().toISOString(), stage, status: 'skipped', failure_reason: reason });
    this.warn(`${stage} skipped: ${reason}`);
  }

  /**
   * End-of-run summary: one line per finished stage, then the totals
   */
  summarize(): string[] {
    const lines: string[] = ['\n=== DERIVATION SUMMARY ===\n'];
    for (const entry of this.entries) {
      if (entry.status === 'success') {
        lines.push(`  ✓ ${entry.stage}: ${entry.rows_written ?? 0} rows in ${entry.duration_ms ?? 0}ms`);
      } else if (entry.status === 'failed') {
        lines.push(`  ✗ ${entry.stage}: ${entry.failure_reason ?? 'unknown failure'}`);
      } else if (entry.status === 'skipped') {
        lines.push(`  - ${entry.stage}: ${entry.failure_reason ?? 'skipped'}`);
      }
    }
    const succeeded = this.getEntriesByStatus('success');
    const rows = succeeded.reduce((sum, entry) => sum + (entry.rows_written ?? 0), 0);
    lines.push(`\n${succeeded.length} stage(s) succeeded, ${rows} rows written`);

    for (const line of lines) {
      this.print('log', line);
    }
    return lines;
  }

  /**
   * Add entry with rotation
   */
  private addEntry(entry: StageLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  private print(level: 'log' | 'warn' | 'error', line: string): void {
    if (this.silent) {
      return;
    }
    console[level](line);
  }

  getEntries(): StageLogEntry[] {
    return [...this.entries];
  }

  getEntriesByStatus(status: StageLogEntry['status']): StageLogEntry[] {
    return this.entries.filter(entry => entry.status === status);
  }

  clear(): void {
    this.entries = [];
  }
}
