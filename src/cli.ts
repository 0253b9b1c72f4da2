#!/usr/bin/env tsx
import { resolve } from "path";
import { pathToFileURL } from "url";
import { parseArgs } from "util";
import { build } from "./build/builder";
import { loadConfig, resolveBuildOptions, type BuildOverrides } from "./config";
import { BuildFailedError, errorMessage } from "./errors";
import { startDevServer } from "./server";
import { consoleLogger, formatWarnings, logReport, type Logger } from "./warn";

export const USAGE = `Usage:
  pagewright build [--release] [--tag name] [--force] [--no-clean-urls] [--verbose]
  pagewright dev [--port 8080] [--verbose]`;

function parseCli(args: string[]) {
  return parseArgs({
    args,
    options: {
      release: { type: "boolean" },
      tag: { type: "string" },
      force: { type: "boolean" },
      "no-clean-urls": { type: "boolean" },
      port: { type: "string" },
      verbose: { type: "boolean", short: "v" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
  });
}

export interface CliIo {
  cwd: string;
  logger?: Logger;
}

/** Run one command and resolve with its exit code; `dev` resolves once the server is up */
export async function main(args: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(args);
  } catch (err) {
    (io.logger ?? consoleLogger()).error(`${errorMessage(err)}\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;
  const logger = io.logger ?? consoleLogger(values.verbose ?? false);
  const [command] = positionals;

  if (values.help || !command) {
    logger.info(USAGE);
    return values.help ? 0 : 1;
  }

  const overrides: BuildOverrides = {
    tag: values.tag,
    release: values.release,
    force: values.force,
    cleanUrls: values["no-clean-urls"] ? false : undefined,
    verbose: values.verbose,
  };

  try {
    if (command === "build") {
      const loaded = await loadConfig(io.cwd);
      if (loaded.warnings.length > 0) logger.warn(formatWarnings("Config warnings", loaded.warnings));
      const options = resolveBuildOptions(io.cwd, loaded, overrides);
      const report = await build(options, { logger });
      logReport(logger, report);
      if (report.escalated) throw new BuildFailedError(`Every unit of the ${report.tag} build failed`);
      return report.failed > 0 ? 1 : 0;
    }

    if (command === "dev") {
      const port = values.port === undefined ? undefined : Number.parseInt(values.port, 10);
      if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
        logger.error(`Invalid --port "${values.port ?? ""}"`);
        return 1;
      }
      await startDevServer({ root: io.cwd, port, overrides, logger });
      return 0;
    }
  } catch (err) {
    logger.error(errorMessage(err));
    return 1;
  }

  logger.error(`Unknown command "${command}"\n${USAGE}`);
  return 1;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(resolve(entry)).href) {
  const code = await main(process.argv.slice(2), { cwd: process.cwd() });
  if (code !== 0) process.exit(code);
}
