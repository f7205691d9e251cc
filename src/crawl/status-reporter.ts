/**
 * Console reporter for visit outcomes
 */
import { compilePattern } from './scope.js';
import type { VisitOutcome } from './types.js';

export const DEFAULT_PRINT_STATUS = '.*';

export interface StatusSink {
  write(chunk: string): unknown;
}

export class StatusReporter {
  private readonly filter: RegExp;

  constructor(
    printStatus: string = DEFAULT_PRINT_STATUS,
    private readonly out: StatusSink = process.stdout
  ) {
    this.filter = compilePattern(printStatus);
  }

  /** Whether a status would be printed. */
  accepts(status: VisitOutcome['status']): boolean {
    return this.filter.test(String(status));
  }

  /** Print `<status>\t<url>` when the status passes the filter. */
  report(outcome: Pick<VisitOutcome, 'status' | 'url'>): boolean {
    if (!this.accepts(outcome.status)) return false;
    this.out.write(`${outcome.status}\t${outcome.url}\n`);
    return true;
  }
}
