import type { SessionEventProcessor } from './eventProcessor.js';

export type SessionState = 'created' | 'started' | 'finished' | 'closed';

export type SessionOutcome =
  | { status: 'completed' }
  | { status: 'failed'; error: unknown }
  | { status: 'canceled' };

/** Background work of a session. Should stop early once `signal` is aborted. */
export type SessionJob = (signal: AbortSignal) => Promise<void>;

/**
 * Binds one event processor to one background job.
 *
 * created -> started -> finished -> closed. The job runs at most once. Closing aborts a
 * running job and closes the processor; a closed session counts as finished even when the
 * job ignores the abort signal.
 */
export class Session {
  readonly eventProcessor: SessionEventProcessor;

  private readonly job: SessionJob;
  private readonly abortController = new AbortController();
  private readonly outcome: Promise<SessionOutcome>;
  private readonly observers: Promise<unknown>[] = [];
  private readonly resolveOutcome: (outcome: SessionOutcome) => void;
  private started = false;
  private finished = false;
  private closing: Promise<void> | null = null;

  constructor(eventProcessor: SessionEventProcessor, job: SessionJob) {
    this.eventProcessor = eventProcessor;
    this.job = job;
    let resolveOutcome: (outcome: SessionOutcome) => void = () => undefined;
    this.outcome = new Promise((resolve) => {
      resolveOutcome = resolve;
    });
    this.resolveOutcome = resolveOutcome;
  }

  get contextId(): string {
    return this.eventProcessor.contextId;
  }

  get taskId(): string {
    return this.eventProcessor.taskId;
  }

  get state(): SessionState {
    if (this.closing) return 'closed';
    if (this.finished) return 'finished';
    return this.started ? 'started' : 'created';
  }

  get isActive(): boolean {
    return this.started && !this.finished;
  }

  start(): void {
    if (this.started || this.closing) return;
    this.started = true;

    let run: Promise<void>;
    try {
      run = this.job(this.abortController.signal);
    } catch (error) {
      run = Promise.reject(error);
    }
    void run.then(
      () => this.finish(this.abortController.signal.aborted ? { status: 'canceled' } : { status: 'completed' }),
      (error: unknown) => this.finish(this.abortController.signal.aborted ? { status: 'canceled' } : { status: 'failed', error }),
    );
  }

  /** Resolves with how the job ended. Never rejects. */
  completion(): Promise<SessionOutcome> {
    return this.outcome;
  }

  /** Makes `join()` also wait for `work`, such as cleanup that runs after the job. */
  trackCompletion(work: Promise<unknown>): void {
    this.observers.push(work);
  }

  /**
   * Starts the session if needed and waits for the job, for in-flight events to be taken by
   * subscribers and for every tracked observer.
   */
  async join(): Promise<SessionOutcome> {
    this.start();
    const outcome = await this.outcome;
    await this.eventProcessor.idle();
    let seen = 0;
    while (seen < this.observers.length) {
      const batch = this.observers.slice(seen);
      seen = this.observers.length;
      await Promise.allSettled(batch);
    }
    return outcome;
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.abortController.abort();
      this.finish({ status: 'canceled' });
      this.closing = this.eventProcessor.close();
    }
    return this.closing;
  }

  private finish(outcome: SessionOutcome): void {
    if (this.finished) return;
    this.finished = true;
    this.resolveOutcome(outcome);
  }
}
