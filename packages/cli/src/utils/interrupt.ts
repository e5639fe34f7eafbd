export interface InterruptSource {
  once(event: 'SIGINT', listener: () => void): unknown;
  off(event: 'SIGINT', listener: () => void): unknown;
}

export interface InterruptGuard {
  readonly signal: AbortSignal;
  dispose(): void;
}

/**
 * Aborts `signal` on the first Ctrl-C until disposed. The listener is removed once
 * it fires, so a second Ctrl-C terminates the process as usual.
 */
export function abortOnInterrupt(
  onInterrupt: () => void = () => {},
  source: InterruptSource = process,
): InterruptGuard {
  const controller = new AbortController();
  const listener = () => {
    onInterrupt();
    controller.abort();
  };
  source.once('SIGINT', listener);
  return {
    signal: controller.signal,
    dispose: () => {
      source.off('SIGINT', listener);
    },
  };
}
