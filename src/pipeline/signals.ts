export type LinkedSignal = {
  readonly signal: AbortSignal;
  readonly dispose: () => void;
};

/**
 * Returns a signal that aborts as soon as any of the given signals does,
 * carrying that signal's reason. Call `dispose` once the linked work is
 * done so long-lived parents do not accumulate listeners.
 */
export function linkSignals(signals: ReadonlyArray<AbortSignal>): LinkedSignal {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];

  const dispose = () => {
    for (const detach of detachers.splice(0)) {
      detach();
    }
  };

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      return { signal: controller.signal, dispose };
    }
  }

  for (const signal of signals) {
    const onAbort = () => {
      dispose();
      controller.abort(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    detachers.push(() => signal.removeEventListener("abort", onAbort));
  }

  return { signal: controller.signal, dispose };
}
