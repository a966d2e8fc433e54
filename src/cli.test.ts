import { describe, it, expect } from "vitest";
import { EXIT_FATAL, EXIT_OK, UsageError, exitCodeFor, parseCli } from "./cli";
import { AcquisitionError, ResourceExhaustedError } from "./core/errors";
import type { ProducerReport } from "./domains/capture/producer";
import type { ConsumerReport } from "./domains/processing/consumer";

const producerReport = (overrides: Partial<ProducerReport> = {}): ProducerReport => ({
  framesCaptured: 10,
  framesEnqueued: 10,
  framesDropped: 0,
  stop: { reason: 'operator', origin: 'local', at: 0 },
  ...overrides,
});

const consumerReport = (overrides: Partial<ConsumerReport> = {}): ConsumerReport => ({
  lastProcessedSequence: 9,
  processed: 10,
  failed: 0,
  writeFailed: 0,
  discarded: 0,
  fps: 5,
  lagMs: 12,
  stop: { reason: 'peer-request', origin: 'peer', at: 0 },
  ...overrides,
});

describe("CLI", () => {
  it("should parse the role and config file", () => {
    expect(parseCli(["capture"])).toEqual({ kind: "run", options: { role: "capture" } });
    expect(parseCli(["process", "--config", "relay.yaml"]))
      .toEqual({ kind: "run", options: { role: "process", configFile: "relay.yaml" } });
    expect(parseCli(["-c", "a.yaml", "capture"]))
      .toEqual({ kind: "run", options: { role: "capture", configFile: "a.yaml" } });
  });

  it("should answer help before validating the command", () => {
    expect(parseCli(["--help"])).toEqual({ kind: "help" });
  });

  it("should reject unknown commands, flags and extra arguments", () => {
    expect(() => parseCli([])).toThrow("Missing command");
    expect(() => parseCli(["replay"])).toThrow("Unknown command: replay");
    expect(() => parseCli(["capture", "now"])).toThrow("Unexpected argument: now");
    expect(() => parseCli(["capture", "--fast"])).toThrow(UsageError);
  });

  it("should exit 0 after a clean stop and 1 after a fatal collaborator failure", () => {
    expect(exitCodeFor(producerReport())).toBe(EXIT_OK);
    expect(exitCodeFor(consumerReport())).toBe(EXIT_OK);
    expect(exitCodeFor(producerReport({
      error: new AcquisitionError("unplugged"),
      stop: { reason: 'acquisition-failure', origin: 'local', at: 0 },
    }))).toBe(EXIT_FATAL);
    expect(exitCodeFor(consumerReport({ error: new ResourceExhaustedError("model gone") }))).toBe(EXIT_FATAL);
  });
});
