import fs from "node:fs";
import path from "node:path";
import type { CommitOutcome, DocumentState } from "./document-state.js";
import { describeError, FileAccessError } from "./errors.js";
import type { Logger } from "./logger.js";

export const DEFAULT_DEBOUNCE_MS = 75;
export const DEFAULT_WATCH_POLL_MS = 500;

export interface ChangeWatcherOptions {
  state: DocumentState;
  debounceMs?: number;
  /** Use mtime polling even where native notifications are available. */
  usePolling?: boolean;
  pollIntervalMs?: number;
  readSource?: (filePath: string) => Promise<Uint8Array>;
  logger?: Logger;
}

export interface ChangeWatcher {
  /** Commits the file's current contents, then starts observing it. */
  start(): Promise<CommitOutcome>;
  /** Signals a possible change; bursts within the debounce window collapse into one refresh. */
  notify(): void;
  refresh(): Promise<CommitOutcome>;
  /** Resolves once no read or commit is running or queued. */
  whenIdle(): Promise<void>;
  close(): void;
}

export function createChangeWatcher(
  options: ChangeWatcherOptions,
): ChangeWatcher {
  const { state } = options;
  const debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_WATCH_POLL_MS;
  const readSource =
    options.readSource ??
    ((filePath: string) => fs.promises.readFile(filePath));
  const logger = options.logger ?? console;
  const directory = path.dirname(state.path);
  const fileName = path.basename(state.path);

  let debounceTimer: NodeJS.Timeout | undefined;
  let running: Promise<CommitOutcome> | undefined;
  let queued: Promise<CommitOutcome> | undefined;
  let watcher: fs.FSWatcher | undefined;
  let polling = false;
  let closed = false;

  const readAndCommit = async (): Promise<CommitOutcome> => {
    let content: Uint8Array;
    try {
      content = await readSource(state.path);
    } catch (error) {
      const failure = new FileAccessError(state.path, error);
      const outcome = state.commitFailure(failure);
      if (outcome !== "unchanged") {
        logger.error(`[mdpeek] ${failure.message}`);
      }
      return outcome;
    }

    const outcome = state.commit(content);
    const snapshot = state.currentSnapshot();
    if (outcome === "rendered") {
      logger.log(`[mdpeek] Rendered version ${snapshot.version}`);
    } else if (outcome === "failed") {
      logger.error(
        `[mdpeek] Render failed (version ${snapshot.version}): ${snapshot.lastError ?? "unknown error"}`,
      );
    }
    return outcome;
  };

  // Single consumer: one read+commit at a time, and every request made while
  // one is in flight shares a single follow-up run.
  const refresh = (): Promise<CommitOutcome> => {
    if (!running) {
      running = readAndCommit().finally(() => {
        running = undefined;
      });
      return running;
    }
    if (!queued) {
      queued = running.then(() => {
        queued = undefined;
        return refresh();
      });
    }
    return queued;
  };

  const notify = (): void => {
    if (closed) {
      return;
    }
    if (debounceTimer) {
      clearTimeout(debounceTimer);
    }
    debounceTimer = setTimeout(() => {
      debounceTimer = undefined;
      void refresh();
    }, debounceMs);
  };

  const onPoll = (current: fs.Stats, previous: fs.Stats): void => {
    if (
      current.mtimeMs !== previous.mtimeMs ||
      current.size !== previous.size ||
      current.ino !== previous.ino
    ) {
      notify();
    }
  };

  const startPolling = (): void => {
    if (polling || closed) {
      return;
    }
    polling = true;
    fs.watchFile(
      state.path,
      { persistent: true, interval: pollIntervalMs },
      onPoll,
    );
  };

  const startNativeWatch = (): boolean => {
    let nativeWatcher: fs.FSWatcher;
    try {
      // Watch the directory: editors that save by renaming a temp file over
      // the original leave a per-file watch on the old inode.
      nativeWatcher = fs.watch(directory, { persistent: true }, (_event, changed) => {
        if (changed && path.basename(changed) !== fileName) {
          return;
        }
        notify();
      });
    } catch (error) {
      logger.warn(
        `[mdpeek] File notifications unavailable (${describeError(error)}), polling instead`,
      );
      return false;
    }

    nativeWatcher.on("error", (error) => {
      logger.error(
        `[mdpeek] Watcher error: ${describeError(error)}, polling instead`,
      );
      nativeWatcher.close();
      watcher = undefined;
      startPolling();
    });
    watcher = nativeWatcher;
    return true;
  };

  const start = async (): Promise<CommitOutcome> => {
    if (options.usePolling || !startNativeWatch()) {
      startPolling();
    }
    return refresh();
  };

  const whenIdle = async (): Promise<void> => {
    while (queued ?? running) {
      await (queued ?? running);
    }
  };

  const close = (): void => {
    closed = true;
    if (debounceTimer) {
      clearTimeout(debounceTimer);
      debounceTimer = undefined;
    }
    watcher?.close();
    watcher = undefined;
    if (polling) {
      fs.unwatchFile(state.path, onPoll);
      polling = false;
    }
  };

  return { start, notify, refresh, whenIdle, close };
}
