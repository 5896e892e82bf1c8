import type { Logger } from './logger';

export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface TaskHandle<T> {
  label: string;
  /** Settles once the task has finished; never rejects. */
  done: Promise<TaskOutcome<T>>;
}

export class BackgroundTasks {
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(private readonly logger: Logger) {}

  get pending(): number {
    return this.inFlight.size;
  }

  run<T>(label: string, work: () => Promise<T>): TaskHandle<T> {
    const done = work().then(
      (value): TaskOutcome<T> => ({ ok: true, value }),
      (error: unknown): TaskOutcome<T> => {
        this.logger.warn({ task: label, err: error }, 'background task failed');
        return { ok: false, error };
      }
    );

    this.inFlight.add(done);
    void done.then(() => this.inFlight.delete(done));
    return { label, done };
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
