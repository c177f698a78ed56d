#!/usr/bin/env node
import process from "node:process";
import { Command } from "commander";
import { startPreview } from "./app.js";
import {
  assertReadableFile,
  type CliOptions,
  DEFAULT_HOST,
  DEFAULT_PORT,
  resolveConfig,
} from "./config.js";
import { describeError } from "./errors.js";
import { openInBrowser } from "./open-browser.js";
import { DEFAULT_CLIENT_POLL_MS } from "./page.js";

async function serve(file: string, options: CliOptions): Promise<void> {
  const config = resolveConfig(file, options);
  await assertReadableFile(config.file);

  const preview = await startPreview(config);

  console.log(`Watching ${config.file}`);
  console.log(`Preview available at ${preview.url}`);
  console.log("Press Ctrl+C to exit.");

  if (config.open) {
    try {
      await openInBrowser(preview.url);
    } catch (error) {
      console.warn(
        `[mdpeek] Unable to open browser automatically: ${describeError(error)}`,
      );
    }
  }

  let shuttingDown = false;

  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    await preview.close().catch((error: unknown) => {
      console.error(
        `[mdpeek] Failed to close preview server: ${describeError(error)}`,
      );
    });
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

const program = new Command()
  .name("mdpeek")
  .description("Preview a markdown file in the browser, re-rendered on every save")
  .version("0.1.0")
  .argument("<file>", "markdown file to preview")
  .option("-p, --port <port>", "port to listen on", String(DEFAULT_PORT))
  .option("--host <host>", "loopback address to bind", DEFAULT_HOST)
  .option(
    "--interval <ms>",
    "how often the page checks for a newer version",
    String(DEFAULT_CLIENT_POLL_MS),
  )
  .option("--poll", "poll modification times instead of file notifications")
  .option("--no-open", "do not open the browser")
  .action(serve);

try {
  await program.parseAsync(process.argv);
} catch (error) {
  console.error(`[mdpeek] ${describeError(error)}`);
  process.exit(1);
}
