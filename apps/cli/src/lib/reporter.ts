/**
 * @stackwright/cli - Spinner progress reporter
 *
 * One ora spinner per step; command output is printed dimmed beneath it.
 */

import chalk from 'chalk';
import ora from 'ora';
import type { DeploymentRun, StepName, StepRecord } from '@stackwright/shared';
import type { ProgressReporter } from '@stackwright/feature-deployment';
import { STEP_LABELS, firstLine, formatDuration, formatRunSummary } from './formatter.js';

export interface SpinnerReporterOptions {
  composeCommand: string;
  primaryService: string;
  /** Disable animation, e.g. while tool output is streamed to the terminal. */
  animate?: boolean;
}

export class SpinnerReporter implements ProgressReporter {
  private spinner: ora.Ora | null = null;

  constructor(private readonly options: SpinnerReporterOptions) {}

  stepStarted(_step: StepName, message: string): void {
    this.spinner = ora({ text: message, isEnabled: this.options.animate === false ? false : undefined }).start();
  }

  stepSucceeded(record: StepRecord): void {
    const label = STEP_LABELS[record.name];
    if (record.status === 'skipped') {
      this.take(label).info(`${label}: ${record.output ?? 'skipped'}`);
      return;
    }
    const detail = record.output ? chalk.gray(` ${record.output}`) : '';
    this.take(label).succeed(`${label} (${formatDuration(record.duration)})${detail}`);
  }

  stepFailed(record: StepRecord, fatal: boolean): void {
    const label = STEP_LABELS[record.name];
    const reason = firstLine(record.error);
    if (fatal) {
      this.take(label).fail(`${label}: ${reason}`);
    } else {
      this.take(label).warn(`${label}: ${reason} (continuing)`);
    }
  }

  output(_step: StepName, text: string): void {
    console.log(chalk.gray(text.replace(/^/gm, '    ')));
  }

  finished(run: DeploymentRun): void {
    this.spinner?.stop();
    this.spinner = null;
    console.log(formatRunSummary(run, this.options));
  }

  /** The running spinner, or a fresh one for steps reported without a start. */
  private take(text: string): ora.Ora {
    const spinner = this.spinner ?? ora({ text });
    this.spinner = null;
    return spinner;
  }
}
