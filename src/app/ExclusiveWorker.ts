import { logger } from '../utils/logger.js';

export type Task<T> = (signal: AbortSignal) => Promise<T>;

export type RunOutcome = 'applied' | 'failed' | 'superseded';

/**
 * Runs at most one live task. Starting a task supersedes the previous one:
 * its signal is aborted and, whenever it settles, its result is dropped
 * because its generation is no longer the latest.
 */
export class ExclusiveWorker {
  private generation = 0;
  private controller: AbortController | null = null;
  private running = 0;

  constructor(readonly name: string) {}

  get busy() { return this.running > 0; }

  /** Generation of the most recently started task. */
  get current() { return this.generation; }

  async run<T>(task: Task<T>, apply: (result: T) => void, onError?: (err: unknown) => void): Promise<RunOutcome> {
    this.controller?.abort();
    const controller = new AbortController();
    this.controller = controller;
    const gen = ++this.generation;
    this.running++;
    try {
      const result = await task(controller.signal);
      if (gen !== this.generation) {
        logger.debug({ worker: this.name, gen, latest: this.generation }, 'worker_result_superseded');
        return 'superseded';
      }
      apply(result);
      return 'applied';
    } catch (err) {
      if (gen !== this.generation) return 'superseded';
      if (onError) onError(err);
      else logger.error({ err, worker: this.name }, 'worker_task_failed');
      return 'failed';
    } finally {
      this.running--;
      if (this.controller === controller) this.controller = null;
    }
  }

  /** Supersede whatever is in flight without starting anything new. */
  cancel() {
    this.controller?.abort();
    this.controller = null;
    this.generation++;
  }
}
