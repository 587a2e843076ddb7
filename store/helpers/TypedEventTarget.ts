type EventHandler<E extends Event> = ((e: E) => void) | { handleEvent(e: E): void };

/**
 * An `EventTarget` whose events are `CustomEvent`s with a known detail type per
 * event name.
 */
export class TypedEventTarget<Details extends Record<string, unknown>> extends EventTarget {
  override addEventListener<K extends keyof Details & string>(
    type: K,
    callback: EventHandler<CustomEvent<Details[K]>> | null,
    options?: AddEventListenerOptions | boolean,
  ): void {
    super.addEventListener(type, callback as EventListenerOrEventListenerObject, options);
  }

  override removeEventListener<K extends keyof Details & string>(
    type: K,
    callback: EventHandler<CustomEvent<Details[K]>> | null,
    options?: EventListenerOptions | boolean,
  ): void {
    super.removeEventListener(type, callback as EventListenerOrEventListenerObject, options);
  }

  protected emit<K extends keyof Details & string>(type: K, detail: Details[K]): boolean {
    return this.dispatchEvent(new CustomEvent(type, { detail }));
  }
}
