/**
 * Step timing for one pipeline run
 */

import type { Logger } from 'pino';

export interface StepSummary {
  step: string;
  durationMs: number;
  durationFormatted: string;
}

export interface RunSummary {
  totalDurationMs: number;
  totalDurationFormatted: string;
  steps: StepSummary[];
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * StepTimer - records how long each named step of a run takes
 */
export class StepTimer {
  private readonly runStart: number;
  private currentStep: string | null = null;
  private stepStart = 0;
  private readonly steps: StepSummary[] = [];

  constructor(private readonly logger: Logger) {
    this.runStart = Date.now();
  }

  /**
   * Start timing a step, ending the previous one if still running
   */
  startStep(stepName: string): void {
    if (this.currentStep) {
      this.endStep();
    }

    this.currentStep = stepName;
    this.stepStart = Date.now();
    this.logger.debug({ step: stepName }, `Step started: ${stepName}`);
  }

  endStep(): void {
    if (!this.currentStep) return;

    const durationMs = Date.now() - this.stepStart;
    this.steps.push({
      step: this.currentStep,
      durationMs,
      durationFormatted: formatDuration(durationMs),
    });
    this.logger.debug(
      { step: this.currentStep, durationMs },
      `Step completed: ${this.currentStep} (${formatDuration(durationMs)})`
    );

    this.currentStep = null;
  }

  getSummary(): RunSummary {
    if (this.currentStep) {
      this.endStep();
    }

    const totalDurationMs = Date.now() - this.runStart;
    return {
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      steps: [...this.steps],
    };
  }

  logSummary(): void {
    const summary = this.getSummary();
    const breakdown = summary.steps.map((s) => `${s.step}: ${s.durationFormatted}`).join(' | ');

    this.logger.info(
      { totalDurationMs: summary.totalDurationMs, steps: summary.steps },
      `Run completed in ${summary.totalDurationFormatted} (${breakdown})`
    );
  }
}
