export type Procedure = () => void;

/**
 * Shape a host event loop must have to drive effects. Nothing here assumes a
 * thread model: `async` hands the procedure over and the host decides when
 * and where it runs.
 */
export interface EventLoop {
  async(fn: Procedure): void;
  finish(): void;
  pause(): void;
  resume(): void;
}
