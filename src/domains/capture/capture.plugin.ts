import type { Plugin } from "../../core/plugin";
import type { RelayConfig, CameraConfig, DisplayConfig } from "../config/schema";
import type { Camera, Display } from "./drivers/types";
import { MockCamera } from "./drivers/mock-camera";
import { FfmpegCamera } from "./drivers/ffmpeg-camera";
import { HeadlessDisplay } from "./drivers/headless-display";
import { TerminalDisplay, type KeyInput } from "./drivers/terminal-display";
import { CaptureProducer, type ProducerReport } from "./producer";
import { FrameClient } from "../transport/frame-client";
import { describeEndpoint, endpointFromConfig } from "../transport/endpoint";
import type { ShutdownCoordinator } from "../shutdown/coordinator";
import type { Logger } from "../observability/types";
import { rootLogger } from "../observability/logger";

export function createCamera(config: CameraConfig, logger: Logger): Camera {
  switch (config.driver) {
    case "mock":
      return new MockCamera(`mock:${config.device}`, {
        width: config.width,
        height: config.height,
        fps: config.fps,
      });
    case "ffmpeg":
      return new FfmpegCamera(config, logger);
  }
}

export function createDisplay(
  config: DisplayConfig,
  input: KeyInput = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Display {
  // Without a terminal there is nobody to read keys from.
  if (!config.enabled || !input.isTTY) return new HeadlessDisplay();
  return new TerminalDisplay(input, output, {
    refreshMs: config.refreshMs,
    banner: `Press '${config.stopKey}' to stop capturing`,
  });
}

export interface CaptureDrivers {
  camera?: Camera;
  display?: Display;
}

/**
 * Capture process: connects to the processing process, then runs the
 * producer until something requests a stop. `done` settles with the
 * producer's report.
 */
export class CapturePlugin implements Plugin {
  name = "capture";
  private client?: FrameClient;
  private producer?: CaptureProducer;
  private running?: Promise<ProducerReport>;
  private readonly log: Logger;

  constructor(
    private readonly config: RelayConfig,
    private readonly coordinator: ShutdownCoordinator,
    private readonly drivers: CaptureDrivers = {},
    logger: Logger = rootLogger
  ) {
    this.log = logger;
  }

  setup(): void {
    const { camera, transport } = this.config;
    this.log.info(`Capturing ${camera.width}x${camera.height} @ ${camera.fps}fps from ${camera.driver} camera`, {
      endpoint: describeEndpoint(endpointFromConfig(transport)),
    });
  }

  async start(): Promise<void> {
    const { transport, camera: cameraConfig, display: displayConfig, capture } = this.config;
    const endpoint = endpointFromConfig(transport);

    this.client = new FrameClient(
      endpoint,
      this.coordinator,
      {
        retries: transport.connectRetries,
        retryDelayMs: transport.connectRetryDelayMs,
        closeTimeoutMs: this.config.shutdown.graceMs,
      },
      this.log
    );
    const connected = await this.client.connect({ width: cameraConfig.width, height: cameraConfig.height, channels: 3 });
    if (!connected) {
      // Stopped while still waiting for the processing process: nothing to capture.
      this.running = Promise.resolve({
        framesCaptured: 0,
        framesEnqueued: 0,
        framesDropped: 0,
        stop: this.coordinator.request,
      });
      return;
    }

    const camera = this.drivers.camera ?? createCamera(cameraConfig, this.log);
    const display = this.drivers.display ?? createDisplay(displayConfig);
    this.producer = new CaptureProducer(
      camera,
      display,
      this.client,
      this.coordinator,
      {
        stopKey: displayConfig.stopKey,
        acquireTimeoutMs: cameraConfig.acquireTimeoutMs,
        statsInterval: capture.statsInterval,
        maxFrames: capture.maxFrames,
        keyPollMs: displayConfig.refreshMs,
      },
      this.log
    );
    this.running = this.producer.run();
  }

  get done(): Promise<ProducerReport> {
    if (!this.running) {
      return Promise.reject(new Error("Capture plugin has not been started"));
    }
    return this.running;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.coordinator.requestStop("fatal");
    await this.running;
    this.log.info(`Transport sent ${this.client?.sent ?? 0} frames, dropped ${this.client?.dropped ?? 0}`);
  }
}
