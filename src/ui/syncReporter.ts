/**
 * Console report sink with colors and progress bars
 * Gracefully degrades to plain text in non-interactive environments
 */

import cliProgress from 'cli-progress';
import chalk from 'chalk';
import type { Logger } from '../logger.js';
import type { ReportSink, ResourceKind, UnknownResource } from '../reconcile/types.js';

export class SyncReporter implements ReportSink {
  private bar: cliProgress.SingleBar | null = null;
  private readonly isInteractive: boolean;
  private total = 0;

  constructor(private readonly logger: Logger, private readonly quiet: boolean = false) {
    // Only draw progress bars in an interactive terminal
    this.isInteractive = Boolean(process.stdout.isTTY) && !quiet && !process.env.NO_COLOR && !process.env.CI;
  }

  phaseStarted(title: string): void {
    this.logger.heading(title);
  }

  changesFound(kind: ResourceKind, created: number, updated: number): void {
    this.logger.notice(`${capitalize(kind)} have changed (${created} created, ${updated} updated)`);
  }

  upToDate(kind: ResourceKind, total: number): void {
    this.logger.success(`All ${total} ${kind} are up to date`);
  }

  applyStarted(kind: ResourceKind, total: number): void {
    this.total = total;
    if (!this.isInteractive) {
      this.logger.log(` Applying ${total} ${kind} change(s)`);
      return;
    }
    this.bar = new cliProgress.SingleBar({
      format: ` ${chalk.cyan(capitalize(kind))} |{bar}| {percentage}% | {value}/{total}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    }, cliProgress.Presets.shades_classic);
    this.bar.start(total, 0);
  }

  applyProgress(completed: number): void {
    if (this.bar) {
      this.bar.update(completed);
    } else if (!this.quiet) {
      this.logger.log(`  ${completed}/${this.total}`);
    }
  }

  applyFinished(kind: ResourceKind): void {
    if (this.bar) {
      this.bar.stop();
      this.bar = null;
    }
    this.logger.success(`${capitalize(kind)} successfully synchronized`);
  }

  unknownResources(kind: ResourceKind, resources: UnknownResource[]): void {
    if (resources.length === 0) return;
    this.logger.notice(`Identified ${resources.length} unknown ${kind}:`);
    for (const resource of resources) {
      this.logger.log(resource.key ? `  ${resource.name} (${resource.key})` : `  ${resource.name}`);
    }
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
