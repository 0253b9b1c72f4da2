import pc from "picocolors";
import type { BuildFailure, BuildReport } from "./build/builder";
import type { BuildWarning } from "./errors";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function consoleLogger(verbose = false): Logger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.warn(message),
    error: (message) => console.error(message),
    debug: (message) => {
      if (verbose) console.log(pc.dim(message));
    },
  };
}

/** Discards everything; the default for programmatic builds */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export function formatWarnings(context: string, warnings: BuildWarning[]): string {
  const header = pc.yellow(pc.bold(`⚠️ [pagewright] ${context} (${warnings.length})`));
  const lines = warnings.map((item) => pc.yellow(`  - ${item.message}`)).join("\n");
  return `${header}\n${lines}`;
}

export function formatBuildErrors(failures: BuildFailure[]): string {
  const header = pc.red(pc.bold(`✖ [pagewright] Failed (${failures.length})`));
  const lines = failures
    .map(({ path, error }) => {
      const [first = "", ...rest] = error.message.split("\n");
      return [pc.red(`  - ${path || "."}: ${first}`), ...rest.map((line) => pc.red(`    ${line}`))].join("\n");
    })
    .join("\n");
  return `${header}\n${lines}`;
}

export function formatSummary(report: BuildReport): string {
  const parts = [
    pc.green(`${report.rendered} rendered`),
    `${report.skipped} skipped`,
    report.warnings.length > 0 ? pc.yellow(`${report.warnings.length} warned`) : `0 warned`,
    report.failed > 0 ? pc.red(`${report.failed} failed`) : `0 failed`,
  ];
  return `${pc.bold(`[pagewright] ${report.tag}:`)} ${parts.join(", ")}`;
}

/** Print warnings and errors of a finished pass, then its summary line */
export function logReport(logger: Logger, report: BuildReport): void {
  if (report.warnings.length > 0) logger.warn(formatWarnings("Warnings", report.warnings));
  if (report.errors.length > 0) logger.error(formatBuildErrors(report.errors));
  logger.info(formatSummary(report));
}
