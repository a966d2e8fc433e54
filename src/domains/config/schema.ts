import { z } from "zod";

const rgb = z.tuple([
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
  z.number().int().min(0).max(255),
]);

export const transportSchema = z.object({
  socketPath: z.string().min(1).default("/tmp/frame-relay.sock"),
  host: z.string().min(1).default("localhost"),
  // When set, a loopback TCP endpoint is used instead of the unix socket.
  port: z.number().int().min(1).max(65535).optional(),
  capacity: z.number().int().min(1).max(64).default(2),
  connectRetries: z.number().int().min(0).default(5),
  connectRetryDelayMs: z.number().int().min(0).default(2000),
});

export const cameraSchema = z.object({
  driver: z.enum(["mock", "ffmpeg"]).default("mock"),
  device: z.string().default("/dev/video0"),
  inputFormat: z.string().default("v4l2"),
  width: z.number().int().positive().default(320),
  height: z.number().int().positive().default(240),
  fps: z.number().positive().default(5),
  acquireTimeoutMs: z.number().int().positive().default(2000),
});

export const displaySchema = z.object({
  enabled: z.boolean().default(true),
  stopKey: z.string().min(1).default("q"),
  refreshMs: z.number().int().positive().default(100),
});

export const captureSchema = z.object({
  statsInterval: z.number().int().min(0).default(30),
  maxFrames: z.number().int().positive().optional(),
});

export const processingSchema = z.object({
  drainPolicy: z.enum(["flush", "discard"]).default("flush"),
  statsInterval: z.number().int().min(0).default(30),
  keyColor: rgb.default([0, 177, 64]),
  keyTolerance: z.number().gt(0).max(1).default(0.25),
  maskThreshold: z.number().min(0).max(1).default(0.2),
  backgroundColor: rgb.default([192, 192, 192]),
});

export const outputSchema = z.object({
  dir: z.string().min(1).default("output_frames"),
  reuseDirectory: z.boolean().default(false),
  sequencePadding: z.number().int().min(1).max(20).default(6),
});

export const shutdownSchema = z.object({
  graceMs: z.number().int().positive().default(5000),
});

export const logSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  format: z.enum(["json", "pretty"]).default("pretty"),
});

export const relayConfigSchema = z.object({
  transport: transportSchema.default({}),
  camera: cameraSchema.default({}),
  display: displaySchema.default({}),
  capture: captureSchema.default({}),
  processing: processingSchema.default({}),
  output: outputSchema.default({}),
  shutdown: shutdownSchema.default({}),
  log: logSchema.default({}),
});

export type RelayConfig = z.infer<typeof relayConfigSchema>;
export type TransportConfig = RelayConfig["transport"];
export type CameraConfig = RelayConfig["camera"];
export type DisplayConfig = RelayConfig["display"];
export type CaptureConfig = RelayConfig["capture"];
export type ProcessingConfig = RelayConfig["processing"];
export type OutputConfig = RelayConfig["output"];
export type DrainPolicy = ProcessingConfig["drainPolicy"];
export type Rgb = z.infer<typeof rgb>;
