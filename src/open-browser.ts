import { spawn } from "node:child_process";
import process from "node:process";

export interface BrowserCommand {
  command: string;
  args: string[];
}

export function browserCommand(
  url: string,
  platform: NodeJS.Platform = process.platform,
): BrowserCommand {
  switch (platform) {
    case "darwin": {
      return { command: "open", args: [url] };
    }
    case "win32": {
      // `start` treats the first quoted argument as a window title.
      return { command: "cmd", args: ["/c", "start", "", url] };
    }
    default: {
      return { command: "xdg-open", args: [url] };
    }
  }
}

export function openInBrowser(url: string): Promise<void> {
  const { command, args } = browserCommand(url);

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore" });

    child.once("error", (error) => {
      reject(new Error(`Unable to open browser: ${error.message}`));
    });

    child.once("exit", (code) => {
      if (code !== null && code !== 0) {
        reject(new Error(`${command} exited with code ${code}`));
        return;
      }
      resolve();
    });
  });
}
