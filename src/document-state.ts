import { createHash } from "node:crypto";
import path from "node:path";
import { describeError, type FileAccessError, RenderError } from "./errors.js";
import { renderSource } from "./markdown.js";
import { type PageContent, renderPage } from "./page.js";

export interface Snapshot {
  readonly version: number;
  /** Complete preview page, carrying `version` as its marker. */
  readonly html: string;
  /** SHA-256 of the bytes behind `html`; undefined when the file could not be read. */
  readonly contentHash: string | undefined;
  readonly lastError: string | undefined;
  readonly updatedAt: Date;
}

export type CommitOutcome = "unchanged" | "rendered" | "failed";

export interface DocumentStateReader {
  readonly path: string;
  currentSnapshot(): Snapshot;
}

export interface DocumentState extends DocumentStateReader {
  commit(content: Uint8Array): CommitOutcome;
  commitFailure(error: FileAccessError): CommitOutcome;
}

export interface CreateDocumentStateOptions {
  path: string;
  render?: (content: Uint8Array) => string;
  pollIntervalMs?: number;
  now?: () => Date;
}

/**
 * Holds the one snapshot the server reads from. Every commit builds a new
 * frozen snapshot and publishes it with a single assignment, so a reader
 * sees either the previous snapshot or the next one, never a mix.
 */
export function createDocumentState(
  options: CreateDocumentStateOptions,
): DocumentState {
  const fullPath = options.path;
  const fileName = path.basename(fullPath);
  const render = options.render ?? renderSource;
  const now = options.now ?? (() => new Date());

  let snapshot = buildSnapshot(0, { kind: "pending" }, undefined);

  function buildSnapshot(
    version: number,
    content: PageContent,
    contentHash: string | undefined,
  ): Snapshot {
    return Object.freeze({
      version,
      html: renderPage({
        fileName,
        fullPath,
        version,
        content,
        pollIntervalMs: options.pollIntervalMs,
      }),
      contentHash,
      lastError: content.kind === "error" ? content.message : undefined,
      updatedAt: now(),
    });
  }

  const commit = (content: Uint8Array): CommitOutcome => {
    const contentHash = hashContent(content);
    if (contentHash === snapshot.contentHash) {
      return "unchanged";
    }

    const version = snapshot.version + 1;
    let next: Snapshot;
    try {
      next = buildSnapshot(
        version,
        { kind: "rendered", html: render(content) },
        contentHash,
      );
    } catch (error) {
      const failure =
        error instanceof RenderError
          ? error
          : new RenderError(describeError(error), { cause: error });
      snapshot = buildSnapshot(
        version,
        { kind: "error", message: failure.message },
        contentHash,
      );
      return "failed";
    }

    snapshot = next;
    return "rendered";
  };

  const commitFailure = (error: FileAccessError): CommitOutcome => {
    if (
      snapshot.contentHash === undefined &&
      snapshot.lastError === error.message
    ) {
      return "unchanged";
    }

    snapshot = buildSnapshot(
      snapshot.version + 1,
      { kind: "error", message: error.message },
      undefined,
    );
    return "failed";
  };

  return {
    path: fullPath,
    currentSnapshot: () => snapshot,
    commit,
    commitFailure,
  };
}

export function hashContent(content: Uint8Array): string {
  return createHash("sha256").update(content).digest("hex");
}
