import {
  type ChangeWatcher,
  createChangeWatcher,
} from "./change-watcher.js";
import type { PreviewConfig } from "./config.js";
import {
  createDocumentState,
  type DocumentState,
} from "./document-state.js";
import type { Logger } from "./logger.js";
import { createPreviewServer, type PreviewServer } from "./preview-server.js";

export interface Preview {
  url: string;
  state: DocumentState;
  watcher: ChangeWatcher;
  server: PreviewServer;
  close(): Promise<void>;
}

export interface StartPreviewOptions {
  logger?: Logger;
  debounceMs?: number;
}

/**
 * Populates the document from the file, starts watching it and then starts
 * serving. A bind failure stops the watcher before rethrowing.
 */
export async function startPreview(
  config: PreviewConfig,
  options: StartPreviewOptions = {},
): Promise<Preview> {
  const logger = options.logger ?? console;
  const state = createDocumentState({
    path: config.file,
    pollIntervalMs: config.pollIntervalMs,
  });
  const watcher = createChangeWatcher({
    state,
    usePolling: config.poll,
    debounceMs: options.debounceMs,
    logger,
  });

  await watcher.start();

  let server: PreviewServer;
  try {
    server = await createPreviewServer({
      state,
      host: config.host,
      port: config.port,
      logger,
    });
  } catch (error) {
    watcher.close();
    throw error;
  }

  const close = async (): Promise<void> => {
    watcher.close();
    await server.close();
  };

  return { url: server.url, state, watcher, server, close };
}
