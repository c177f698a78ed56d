import { describe, expect, it } from "vitest";
import { browserCommand } from "../src/open-browser.js";

const PAGE_URL = "http://127.0.0.1:8000/";

describe("browserCommand", () => {
  it("uses open on macOS", () => {
    expect(browserCommand(PAGE_URL, "darwin")).toEqual({
      command: "open",
      args: [PAGE_URL],
    });
  });

  it("uses start through cmd on Windows", () => {
    expect(browserCommand(PAGE_URL, "win32")).toEqual({
      command: "cmd",
      args: ["/c", "start", "", PAGE_URL],
    });
  });

  it("uses xdg-open elsewhere", () => {
    expect(browserCommand(PAGE_URL, "linux")).toEqual({
      command: "xdg-open",
      args: [PAGE_URL],
    });
  });
});
