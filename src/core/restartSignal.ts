export type SignalListener = (version: number) => void;

/**
 * Wake-on-write broadcast. Every `notify()` bumps a version number and wakes
 * all current listeners. A consumer that remembers the last version it
 * handled can tell whether a signal arrived while it was busy and not
 * listening, so no restart is lost between two waits.
 */
export class RestartSignal {
  private current = 0;
  private readonly listeners = new Set<SignalListener>();

  get version(): number {
    return this.current;
  }

  notify(): void {
    this.current += 1;
    for (const listener of [...this.listeners]) {
      listener(this.current);
    }
  }

  listen(listener: SignalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
