import type { Plugin } from "../../core/plugin";
import type { RelayConfig, ProcessingConfig } from "../config/schema";
import { ProcessingConsumer, type ConsumerReport } from "./consumer";
import type { BackgroundRemover } from "./segmentation/types";
import { ChromaKeySegmenter } from "./segmentation/chroma-key";
import { SegmentationBackgroundRemover } from "./segmentation/compositor";
import { OutputSink } from "../output/output-sink";
import type { ImageWriter } from "../output/png-writer";
import { LatestFrameBuffer } from "../transport/latest-frame-buffer";
import { FrameServer } from "../transport/frame-server";
import { describeEndpoint, endpointFromConfig } from "../transport/endpoint";
import type { ShutdownCoordinator } from "../shutdown/coordinator";
import type { Logger } from "../observability/types";
import { rootLogger } from "../observability/logger";

export function createBackgroundRemover(config: ProcessingConfig): BackgroundRemover {
  return new SegmentationBackgroundRemover(
    new ChromaKeySegmenter(config.keyColor, config.keyTolerance),
    { threshold: config.maskThreshold, backgroundColor: config.backgroundColor }
  );
}

export interface ProcessingCollaborators {
  remover?: BackgroundRemover;
  writer?: ImageWriter;
}

/**
 * Processing process: listens for the producer, buffers its frames
 * latest-wins and runs the consumer until the pipeline stops.
 */
export class ProcessingPlugin implements Plugin {
  name = "processing";
  readonly buffer: LatestFrameBuffer;
  private server?: FrameServer;
  private remover?: BackgroundRemover;
  private running?: Promise<ConsumerReport>;
  private readonly log: Logger;

  constructor(
    private readonly config: RelayConfig,
    private readonly coordinator: ShutdownCoordinator,
    private readonly collaborators: ProcessingCollaborators = {},
    logger: Logger = rootLogger
  ) {
    this.log = logger;
    this.buffer = new LatestFrameBuffer(config.transport.capacity);
  }

  setup(): void {
    this.buffer.events.on("dropped", ({ frame, cause }) => {
      this.log.debug(`Dropped frame ${frame.sequence} (${cause})`);
    });
  }

  async start(): Promise<void> {
    const { transport, processing, output, shutdown } = this.config;

    const sink = new OutputSink(output, this.collaborators.writer, this.log);
    await sink.prepare();

    const endpoint = endpointFromConfig(transport);
    this.server = new FrameServer(endpoint, this.buffer, this.coordinator, this.log, shutdown.graceMs);
    await this.server.start();
    this.log.info(`Waiting for frames on ${describeEndpoint(endpoint)}`, { capacity: this.buffer.capacity });

    const remover = this.collaborators.remover ?? createBackgroundRemover(processing);
    this.remover = remover;
    const consumer = new ProcessingConsumer(
      this.buffer,
      remover,
      sink,
      this.coordinator,
      { drainPolicy: processing.drainPolicy, statsInterval: processing.statsInterval },
      this.log
    );
    this.running = consumer.run();
  }

  get done(): Promise<ConsumerReport> {
    if (!this.running) {
      return Promise.reject(new Error("Processing plugin has not been started"));
    }
    return this.running;
  }

  async stop(): Promise<void> {
    try {
      if (this.running) {
        this.coordinator.requestStop("fatal");
        await this.running;
      }
    } finally {
      await this.server?.stop();
      this.remover?.dispose?.();
      this.log.info(`Transport buffer dropped ${this.buffer.dropped} frames`);
    }
  }
}
