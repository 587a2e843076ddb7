import type { EventLoop, Procedure } from '../core/loop/EventLoop';

export class FakeEventLoop implements EventLoop {
  public readonly calls: string[] = [];
  public readonly scheduled: Procedure[] = [];

  public async(fn: Procedure) {
    this.calls.push('async');
    this.scheduled.push(fn);
  }

  public finish() {
    this.calls.push('finish');
  }

  public pause() {
    this.calls.push('pause');
  }

  public resume() {
    this.calls.push('resume');
  }
}
