import { isConversionError, type ConversionStep } from './errors.js';

export type StepStatus = 'ok' | 'warning' | 'error' | 'skipped';

export interface StepRecord {
  readonly step: ConversionStep;
  readonly status: StepStatus;
  readonly durationMs: number;
  readonly detail?: string;
  /** Leading lines of the step's output. */
  readonly snippet?: string;
}

export interface StepOutcome {
  readonly status?: StepStatus;
  readonly detail?: string;
  readonly snippet?: string;
}

const SNIPPET_LINES = 12;

export function snippetOf(text: string): string {
  const lines = text.split('\n');
  return lines.length <= SNIPPET_LINES ? text : `${lines.slice(0, SNIPPET_LINES).join('\n')}\n...`;
}

/** Times pipeline steps and keeps a record of each, including failures. */
export class StepRecorder {
  private readonly records: StepRecord[] = [];

  run<T>(step: ConversionStep, fn: () => T, describe?: (result: T) => StepOutcome): T {
    const started = performance.now();
    let result: T;
    try {
      result = fn();
    } catch (err) {
      const detail = isConversionError(err) ? err.describe() : err instanceof Error ? err.message : String(err);
      this.records.push({ step, status: 'error', durationMs: performance.now() - started, detail });
      throw err;
    }
    const outcome: StepOutcome = describe?.(result) ?? {};
    this.records.push({ step, durationMs: performance.now() - started, ...outcome, status: outcome.status ?? 'ok' });
    return result;
  }

  skip(step: ConversionStep, detail: string): void {
    this.records.push({ step, status: 'skipped', durationMs: 0, detail });
  }

  steps(): readonly StepRecord[] {
    return [...this.records];
  }
}
