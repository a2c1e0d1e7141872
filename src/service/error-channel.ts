// error-channel.ts - Serial hand-off from producers to the single error handler
import { Logger } from '../common/logger';
import { DetectedError } from '../types';

export type ErrorHandler = (error: DetectedError) => Promise<void>;

/**
 * Producers (stream tailer, health checks) submit errors; the handler sees
 * them one at a time in submission order. `submit` resolves once the handler
 * has finished with that error.
 */
export class ErrorChannel {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(private readonly handler: ErrorHandler, private readonly logger: Logger) {}

  get pendingCount(): number {
    return this.pending;
  }

  submit(error: DetectedError): Promise<void> {
    this.pending++;

    const next = this.tail.then(async () => {
      try {
        await this.handler(error);
      } catch (err) {
        this.logger.error(`Error handler failed for ${error.kind}`, err);
      } finally {
        this.pending--;
      }
    });

    this.tail = next;
    return next;
  }

  /** Resolves when everything submitted so far has been handled. */
  drain(): Promise<void> {
    return this.tail;
  }
}
