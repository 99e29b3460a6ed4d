/**
 * Batch progress bar for deletions.
 * Falls back to the logger's per-batch lines outside an interactive terminal.
 */

import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { BatchProgress } from '../salesforce/bulkDeleter.js';

export class DeletionProgressUI {
  private bar: cliProgress.SingleBar | null = null;
  private readonly isInteractive: boolean;

  constructor(quiet: boolean = false) {
    this.isInteractive = Boolean(process.stdout.isTTY) && !quiet && !process.env.NO_COLOR && !process.env.CI;
  }

  get enabled(): boolean {
    return this.isInteractive;
  }

  /**
   * Called for every completed batch; the bar is created on the first one.
   */
  update(progress: BatchProgress, label: string): void {
    if (!this.isInteractive) return;

    if (!this.bar) {
      this.bar = new cliProgress.SingleBar({
        format: '{label} |{bar}| {percentage}% | {value}/{total} versions | batch {batch}/{batches}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        hideCursor: true,
        clearOnComplete: false
      }, cliProgress.Presets.shades_classic);
      this.bar.start(progress.total, 0, { label: chalk.cyan(label), batch: 0, batches: progress.totalBatches });
    }

    this.bar.update(progress.processed, { batch: progress.batch, batches: progress.totalBatches });

    if (progress.processed >= progress.total) {
      this.stop();
    }
  }

  stop(): void {
    if (this.bar) {
      this.bar.stop();
      this.bar = null;
      // Reset colors to prevent bleeding into the next line
      process.stdout.write('\x1b[0m');
    }
  }
}
