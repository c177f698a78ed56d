import fs from "node:fs";
import net from "node:net";
import path from "node:path";
import { z } from "zod";
import { ConfigError, describeError } from "./errors.js";
import { DEFAULT_CLIENT_POLL_MS } from "./page.js";

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8000;

export interface CliOptions {
  host?: string;
  port?: string;
  interval?: string;
  poll?: boolean;
  open?: boolean;
}

export interface PreviewConfig {
  /** Absolute path of the markdown source. */
  file: string;
  host: string;
  port: number;
  open: boolean;
  poll: boolean;
  /** How often the page asks `/updates` for a newer version. */
  pollIntervalMs: number;
}

const configSchema = z.object({
  file: z
    .string({ required_error: "a markdown file path is required" })
    .min(1, "a markdown file path is required"),
  host: z.string().refine(isLoopbackHost, {
    message: "must be a loopback address such as 127.0.0.1, ::1 or localhost",
  }),
  port: z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .min(0, "must be between 0 and 65535")
    .max(65535, "must be between 0 and 65535"),
  interval: z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .min(100, "must be at least 100 milliseconds"),
  open: z.boolean(),
  poll: z.boolean(),
});

export function resolveConfig(
  file: string | undefined,
  options: CliOptions,
  cwd: string = process.cwd(),
): PreviewConfig {
  const result = configSchema.safeParse({
    file,
    host: options.host ?? DEFAULT_HOST,
    port: options.port ?? DEFAULT_PORT,
    interval: options.interval ?? DEFAULT_CLIENT_POLL_MS,
    open: options.open ?? true,
    poll: options.poll ?? false,
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
      ),
    );
  }

  const { data } = result;
  return {
    file: path.resolve(cwd, data.file),
    host: data.host,
    port: data.port,
    open: data.open,
    poll: data.poll,
    pollIntervalMs: data.interval,
  };
}

export function isLoopbackHost(host: string): boolean {
  const normalized = host.toLowerCase();
  if (normalized === "localhost" || normalized === "::1") {
    return true;
  }
  return net.isIPv4(normalized) && normalized.startsWith("127.");
}

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    const stat = await fs.promises.stat(filePath);
    if (!stat.isFile()) {
      throw new Error("Path is not a file");
    }
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    throw new ConfigError([`file: unable to open '${filePath}': ${describeError(error)}`]);
  }
}
