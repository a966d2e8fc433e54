import { parseArgs } from "node:util";
import type { ProducerReport } from "./domains/capture/producer";
import type { ConsumerReport } from "./domains/processing/consumer";
import { isFatal } from "./core/errors";

export type Role = "capture" | "process";

export interface CliOptions {
  role: Role;
  configFile?: string;
}

export type CliRequest = { kind: "run"; options: CliOptions } | { kind: "help" };

export const USAGE = `Usage: frame-relay <capture|process> [--config <file.yaml>]

  capture   read the camera and stream frames to the processing process
  process   receive frames, remove their background and write PNG files

Start "process" first; "capture" connects to it.`;

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isRole(value: string | undefined): value is Role {
  return value === "capture" || value === "process";
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        config: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

export function parseCli(argv: string[]): CliRequest {
  const parsed = readArgs(argv);
  if (parsed.values.help) return { kind: "help" };

  const [role, ...rest] = parsed.positionals;
  if (!isRole(role)) {
    throw new UsageError(role ? `Unknown command: ${role}` : "Missing command");
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest[0]}`);
  }
  const configFile = parsed.values.config;
  return { kind: "run", options: configFile ? { role, configFile } : { role } };
}

/** 0 for a clean stop, 1 when a collaborator failed fatally. */
export function exitCodeFor(report: ProducerReport | ConsumerReport): number {
  if (report.error && isFatal(report.error)) return EXIT_FATAL;
  return report.stop?.reason === "fatal" ? EXIT_FATAL : EXIT_OK;
}
