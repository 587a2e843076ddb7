import type { EventLoop, Procedure } from '../../core/loop/EventLoop';

export interface QueueEventLoopOptions {
  autoRun?: boolean | undefined;
  onError?: ((error: unknown) => void) | undefined;
}

/**
 * Runs procedures one at a time in the order they were handed over.
 *
 * With `autoRun` (the default) the queue drains on a later macrotask, one
 * timer at a time however much is queued; without it nothing runs until
 * `step` is called.
 */
export class QueueEventLoop implements EventLoop {
  private readonly _queue: Procedure[] = [];
  private _paused = false;
  private _finished = false;
  private _running = false;
  private readonly _autoRun: boolean;
  private readonly _onError: (error: unknown) => void;
  private _drainTimer: NodeJS.Timeout | null = null;

  public constructor({ autoRun = true, onError = reportError }: QueueEventLoopOptions = {}) {
    this._autoRun = autoRun;
    this._onError = onError;
  }

  public async(fn: Procedure) {
    if (this._finished) {
      return;
    }
    this._queue.push(fn);
    this._scheduleDrain();
  }

  /** Runs queued procedures, including any they queue, until none remain. */
  public step() {
    if (this._running) {
      return;
    }
    this._cancelDrain();
    this._running = true;
    try {
      while (this._queue.length > 0 && !this._paused && !this._finished) {
        const fn = this._queue.shift()!;
        try {
          fn();
        } catch (e) {
          this._onError(e);
        }
      }
    } finally {
      this._running = false;
    }
  }

  public pause() {
    this._paused = true;
    this._cancelDrain();
  }

  public resume() {
    this._paused = false;
    this._scheduleDrain();
  }

  public finish() {
    this._finished = true;
    this._queue.length = 0;
    this._cancelDrain();
  }

  public isFinished(): boolean {
    return this._finished;
  }

  public get pending(): number {
    return this._queue.length;
  }

  private _scheduleDrain() {
    if (
      this._autoRun &&
      this._drainTimer === null &&
      !this._paused &&
      !this._running &&
      !this._finished &&
      this._queue.length > 0
    ) {
      this._drainTimer = setTimeout(this._drain, 0);
    }
  }

  private _cancelDrain() {
    if (this._drainTimer !== null) {
      clearTimeout(this._drainTimer);
      this._drainTimer = null;
    }
  }

  private readonly _drain = () => {
    this._drainTimer = null;
    this.step();
  };
}

function reportError(error: unknown) {
  console.error('Event loop procedure failed', error);
}
