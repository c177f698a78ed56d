import { describe, expect, it } from "vitest";
import {
  createDocumentState,
  hashContent,
  type Snapshot,
} from "../src/document-state.js";
import { FileAccessError, RenderError } from "../src/errors.js";

const SOURCE_PATH = "/docs/notes.md";
const encode = (value: string): Uint8Array => new TextEncoder().encode(value);
const fixedNow = () => new Date("2026-01-01T00:00:00.000Z");
const missingFile = () =>
  new FileAccessError(
    SOURCE_PATH,
    Object.assign(new Error("no such file"), { code: "ENOENT" }),
  );

describe("createDocumentState", () => {
  it("starts at version 0 with a placeholder page", () => {
    const state = createDocumentState({ path: SOURCE_PATH, now: fixedNow });
    const snapshot = state.currentSnapshot();

    expect(state.path).toBe(SOURCE_PATH);
    expect(snapshot.version).toBe(0);
    expect(snapshot.contentHash).toBeUndefined();
    expect(snapshot.lastError).toBeUndefined();
    expect(snapshot.html).toContain('data-version="0"');
    expect(snapshot.html).toContain("Waiting for markdown…");
  });

  it("commits a rendered snapshot with the next version", () => {
    const state = createDocumentState({ path: SOURCE_PATH, now: fixedNow });
    const content = encode("# Hi");

    expect(state.commit(content)).toBe("rendered");

    const snapshot = state.currentSnapshot();
    expect(snapshot.version).toBe(1);
    expect(snapshot.contentHash).toBe(hashContent(content));
    expect(snapshot.lastError).toBeUndefined();
    expect(snapshot.updatedAt).toEqual(fixedNow());
    expect(snapshot.html).toContain('data-version="1"');
    expect(snapshot.html).toContain('<h1 id="hi">Hi</h1>');
    expect(snapshot.html).toContain("<title>mdpeek — notes.md</title>");
  });

  it("ignores a commit of unchanged bytes", () => {
    const state = createDocumentState({ path: SOURCE_PATH });
    state.commit(encode("# Hi"));
    const before = state.currentSnapshot();

    expect(state.commit(encode("# Hi"))).toBe("unchanged");
    expect(state.currentSnapshot()).toBe(before);
  });

  it("bumps the version by one per effective commit", () => {
    const state = createDocumentState({ path: SOURCE_PATH });
    const edits = ["a", "a", "b", "b", "c", "a"];
    const versions: number[] = [];

    for (const edit of edits) {
      state.commit(encode(edit));
      versions.push(state.currentSnapshot().version);
    }

    expect(versions).toEqual([1, 1, 2, 2, 3, 4]);
  });

  it("commits an error page when rendering fails", () => {
    const state = createDocumentState({ path: SOURCE_PATH, now: fixedNow });
    state.commit(encode("# Hi"));
    const invalid = Uint8Array.from([0x23, 0x20, 0xff]);

    expect(state.commit(invalid)).toBe("failed");

    const snapshot = state.currentSnapshot();
    expect(snapshot.version).toBe(2);
    expect(snapshot.contentHash).toBe(hashContent(invalid));
    expect(snapshot.lastError).toBe("Source is not valid UTF-8 text.");
    expect(snapshot.html).toContain('data-state="error"');
    expect(snapshot.html).toContain("Unable to render notes.md");
    expect(snapshot.html).toContain("<pre>Source is not valid UTF-8 text.</pre>");
  });

  it("keeps the error until the next successful render", () => {
    const state = createDocumentState({ path: SOURCE_PATH });
    const invalid = Uint8Array.from([0xc3, 0x28]);

    expect(state.commit(invalid)).toBe("failed");
    expect(state.commit(invalid)).toBe("unchanged");
    expect(state.currentSnapshot().lastError).toBe(
      "Source is not valid UTF-8 text.",
    );

    expect(state.commit(encode("fixed"))).toBe("rendered");
    expect(state.currentSnapshot().version).toBe(2);
    expect(state.currentSnapshot().lastError).toBeUndefined();
  });

  it("wraps unexpected render failures and escapes their message", () => {
    const state = createDocumentState({
      path: SOURCE_PATH,
      render: () => {
        throw new TypeError("<b>boom</b>");
      },
    });

    expect(state.commit(encode("anything"))).toBe("failed");
    expect(state.currentSnapshot().lastError).toBe("<b>boom</b>");
    expect(state.currentSnapshot().html).toContain(
      "<pre>&lt;b&gt;boom&lt;/b&gt;</pre>",
    );
  });

  it("keeps a RenderError message as is", () => {
    const state = createDocumentState({
      path: SOURCE_PATH,
      render: () => {
        throw new RenderError("grammar exploded");
      },
    });

    state.commit(encode("anything"));
    expect(state.currentSnapshot().lastError).toBe("grammar exploded");
  });

  describe("commitFailure", () => {
    it("commits an access failure once and re-renders when the file returns", () => {
      const state = createDocumentState({ path: SOURCE_PATH });
      const content = encode("# Hi");
      state.commit(content);

      expect(state.commitFailure(missingFile())).toBe("failed");
      expect(state.currentSnapshot().version).toBe(2);
      expect(state.currentSnapshot().contentHash).toBeUndefined();
      expect(state.currentSnapshot().lastError).toBe(
        "Unable to read '/docs/notes.md': no such file",
      );

      expect(state.commitFailure(missingFile())).toBe("unchanged");
      expect(state.currentSnapshot().version).toBe(2);

      expect(state.commit(content)).toBe("rendered");
      expect(state.currentSnapshot().version).toBe(3);
    });

    it("commits a different access failure", () => {
      const state = createDocumentState({ path: SOURCE_PATH });
      state.commitFailure(missingFile());
      const denied = new FileAccessError(
        SOURCE_PATH,
        Object.assign(new Error("permission denied"), { code: "EACCES" }),
      );

      expect(denied.code).toBe("EACCES");
      expect(state.commitFailure(denied)).toBe("failed");
      expect(state.currentSnapshot().version).toBe(2);
    });
  });

  describe("snapshot consistency", () => {
    it("shows readers the previous snapshot while a commit is rendering", () => {
      let seenDuringRender: Snapshot | undefined;
      const state = createDocumentState({
        path: SOURCE_PATH,
        render: () => {
          seenDuringRender = state.currentSnapshot();
          return "<p>next</p>";
        },
      });
      const before = state.currentSnapshot();

      state.commit(encode("next"));

      expect(seenDuringRender).toBe(before);
      const after = state.currentSnapshot();
      expect(after.version).toBe(1);
      expect(after.html).toContain('data-version="1"');
      expect(after.html).toContain("<p>next</p>");
    });

    it("never mutates a published snapshot", () => {
      const state = createDocumentState({ path: SOURCE_PATH });
      state.commit(encode("# One"));
      const first = state.currentSnapshot();

      state.commit(encode("# Two"));

      expect(Object.isFrozen(first)).toBe(true);
      expect(first.version).toBe(1);
      expect(first.html).toContain('data-version="1"');
      expect(first.html).toContain('<h1 id="one">One</h1>');
      expect(first.html).not.toContain("Two");
    });
  });
});
