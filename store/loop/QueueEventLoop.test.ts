import { sleep } from '../../test-helpers/sleep';
import { QueueEventLoop } from './QueueEventLoop';

describe('QueueEventLoop', () => {
  it('runs procedures in the order they were queued', () => {
    const loop = new QueueEventLoop({ autoRun: false });
    const order: number[] = [];
    loop.async(() => order.push(1));
    loop.async(() => order.push(2));
    loop.async(() => order.push(3));

    expect(order).toEqual([]);
    expect(loop.pending).toEqual(3);

    loop.step();

    expect(order).toEqual([1, 2, 3]);
    expect(loop.pending).toEqual(0);
  });

  it('runs procedures queued during a step in the same step', () => {
    const loop = new QueueEventLoop({ autoRun: false });
    const order: string[] = [];
    loop.async(() => {
      order.push('outer');
      loop.async(() => order.push('inner'));
    });
    loop.async(() => order.push('second'));

    loop.step();

    expect(order).toEqual(['outer', 'second', 'inner']);
  });

  it('holds work while paused', () => {
    const loop = new QueueEventLoop({ autoRun: false });
    const fn = mock();
    loop.pause();
    loop.async(fn);
    loop.step();
    expect(fn).not(toHaveBeenCalled());

    loop.resume();
    loop.step();
    expect(fn).toHaveBeenCalled({ times: 1 });
  });

  it('stops a step when a procedure pauses the loop', () => {
    const loop = new QueueEventLoop({ autoRun: false });
    const later = mock();
    loop.async(() => loop.pause());
    loop.async(later);

    loop.step();

    expect(later).not(toHaveBeenCalled());
    expect(loop.pending).toEqual(1);
  });

  it('drops pending work and ignores new work once finished', () => {
    const loop = new QueueEventLoop({ autoRun: false });
    const fn = mock();
    loop.async(fn);
    loop.finish();
    loop.async(fn);
    loop.step();

    expect(fn).not(toHaveBeenCalled());
    expect(loop.pending).toEqual(0);
    expect(loop.isFinished()).isTrue();
  });

  it('reports failing procedures and keeps draining', () => {
    const onError = mock<(error: unknown) => void>();
    const loop = new QueueEventLoop({ autoRun: false, onError });
    const after = mock();
    const failure = new Error('nope');
    loop.async(() => {
      throw failure;
    });
    loop.async(after);

    loop.step();

    expect(onError).toHaveBeenCalledWith(failure);
    expect(after).toHaveBeenCalled({ times: 1 });
  });

  it('drains automatically on a later macrotask', async () => {
    const loop = new QueueEventLoop();
    const fn = mock();
    loop.async(fn);
    expect(fn).not(toHaveBeenCalled());

    await sleep(0);

    expect(fn).toHaveBeenCalled({ times: 1 });
  });

  it('drains automatically after resuming', async () => {
    const loop = new QueueEventLoop();
    const fn = mock();
    loop.pause();
    loop.async(fn);
    await sleep(0);
    expect(fn).not(toHaveBeenCalled());

    loop.resume();
    await sleep(0);

    expect(fn).toHaveBeenCalled({ times: 1 });
  });

  it('runs everything queued before the drain in one pass', async () => {
    const loop = new QueueEventLoop();
    const order: number[] = [];
    loop.async(() => order.push(1));
    loop.async(() => order.push(2));
    expect(loop.pending).toEqual(2);

    await sleep(0);

    expect(order).toEqual([1, 2]);
    expect(loop.pending).toEqual(0);
  });

  it('leaves nothing for the scheduled drain after a manual step', async () => {
    const loop = new QueueEventLoop();
    const fn = mock();
    loop.async(fn);
    loop.step();
    expect(fn).toHaveBeenCalled({ times: 1 });

    await sleep(0);

    expect(fn).toHaveBeenCalled({ times: 1 });
  });

  it('cancels a scheduled drain when paused', async () => {
    const loop = new QueueEventLoop();
    const fn = mock();
    loop.async(fn);
    loop.pause();

    await sleep(0);

    expect(fn).not(toHaveBeenCalled());
    expect(loop.pending).toEqual(1);
  });

  it('cancels a scheduled drain when finished', async () => {
    const loop = new QueueEventLoop();
    const fn = mock();
    loop.async(fn);
    loop.finish();

    await sleep(0);

    expect(fn).not(toHaveBeenCalled());
  });
});
