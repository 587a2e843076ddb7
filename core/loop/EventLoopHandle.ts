import { ContextExpiredError, DETACHED_MESSAGE, EXPIRED_MESSAGE } from '../errors';
import type { EventLoop, Procedure } from './EventLoop';

/**
 * Uniform handle over a host loop, shared by every context derived from one
 * store. The store releases it on close; any later use throws.
 */
export class EventLoopHandle implements EventLoop {
  private _loop: EventLoop | null;

  public constructor(
    loop: EventLoop | null,
    private _reason = EXPIRED_MESSAGE,
  ) {
    this._loop = loop;
  }

  public static detached(): EventLoopHandle {
    return new EventLoopHandle(null, DETACHED_MESSAGE);
  }

  public async(fn: Procedure) {
    this._live().async(fn);
  }

  public finish() {
    this._live().finish();
  }

  public pause() {
    this._live().pause();
  }

  public resume() {
    this._live().resume();
  }

  public isLive(): boolean {
    return this._loop !== null;
  }

  public release() {
    this._loop = null;
    this._reason = EXPIRED_MESSAGE;
  }

  private _live(): EventLoop {
    if (!this._loop) {
      throw new ContextExpiredError(this._reason);
    }
    return this._loop;
  }
}
