// src/orchestrator/watch.ts
// Regenerate when definition files change

import * as fs from "fs";

export type Debounced = {
  /** Schedule a run, replacing any pending one. */
  trigger(): void;
  cancel(): void;
  readonly pending: boolean;
};

/** Last call wins: `run` fires once, `delayMs` after the final trigger of a burst. */
export function debounce(run: () => void, delayMs: number): Debounced {
  let timer: ReturnType<typeof setTimeout> | undefined;
  return {
    trigger() {
      if (timer !== undefined) clearTimeout(timer);
      timer = setTimeout(() => {
        timer = undefined;
        run();
      }, delayMs);
    },
    cancel() {
      if (timer !== undefined) clearTimeout(timer);
      timer = undefined;
    },
    get pending() {
      return timer !== undefined;
    },
  };
}

export type WatchOptions = {
  debounceMs: number;
  /** Called with the error a rebuild threw; the watcher keeps running. */
  onError?: (error: unknown) => void;
};

export type Watcher = {
  close(): void;
};

/**
 * Watch `dir` for `.json` changes and call `rebuild` after each burst.
 * Each rebuild starts from fresh state.
 */
export function watchDefinitions(dir: string, rebuild: () => void, options: WatchOptions): Watcher {
  const onError =
    options.onError ??
    ((error: unknown) => {
      throw error;
    });

  const scheduled = debounce(() => {
    try {
      rebuild();
    } catch (error) {
      onError(error);
    }
  }, options.debounceMs);

  const watcher = fs.watch(dir, (_event, filename) => {
    if (filename === null || filename.endsWith(".json")) scheduled.trigger();
  });

  return {
    close() {
      scheduled.cancel();
      watcher.close();
    },
  };
}
