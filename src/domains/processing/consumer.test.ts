import { describe, it, expect, vi } from "vitest";
import os from "node:os";
import path from "node:path";
import { ProcessingConsumer, type ConsumerOptions, type ConsumerState } from "./consumer";
import type { BackgroundRemover } from "./segmentation/types";
import { LatestFrameBuffer } from "../transport/latest-frame-buffer";
import { OutputSink } from "../output/output-sink";
import type { ImageWriter } from "../output/png-writer";
import { ShutdownCoordinator } from "../shutdown/coordinator";
import { RelayLogger } from "../observability/logger";
import { createFrame } from "../frame/frame";
import type { Frame, RawImage } from "../frame/types";
import { InferenceError, ResourceExhaustedError, WriteError } from "../../core/errors";

const quiet = new RelayLogger({ level: 'error', format: 'json' });

/** The first pixel byte carries the sequence so fakes can tell frames apart. */
function frame(sequence: number): Frame {
  return createFrame(sequence, 1000 + sequence, { width: 1, height: 1, channels: 3, data: Uint8Array.from([sequence, 0, 0]) });
}

const sequenceOf = (image: RawImage) => image.data[0];

class FakeRemover implements BackgroundRemover {
  readonly name = "fake";
  constructor(private readonly failures: Map<number, Error> = new Map()) {}

  removeBackground(image: RawImage): RawImage {
    const failure = this.failures.get(sequenceOf(image));
    if (failure) throw failure;
    return image;
  }
}

class MemoryWriter implements ImageWriter {
  started: number[] = [];
  written: number[] = [];
  private gates = new Map<number, Promise<void>>();
  constructor(private readonly failing: Set<number> = new Set()) {}

  /** Holds the write of `sequence` until the returned function is called. */
  hold(sequence: number): () => void {
    let release = () => {};
    this.gates.set(sequence, new Promise<void>(resolve => {
      release = resolve;
    }));
    return release;
  }

  async encodeAndWrite(_target: string, image: RawImage): Promise<void> {
    const sequence = sequenceOf(image);
    this.started.push(sequence);
    await this.gates.get(sequence);
    if (this.failing.has(sequence)) throw new Error("disk full");
    this.written.push(sequence);
  }
}

async function setup(options: Partial<ConsumerOptions> & { remover?: BackgroundRemover; writer?: MemoryWriter } = {}) {
  const buffer = new LatestFrameBuffer(8);
  const coordinator = new ShutdownCoordinator(quiet);
  const writer = options.writer ?? new MemoryWriter();
  const sink = new OutputSink({ dir: os.tmpdir(), reuseDirectory: true, sequencePadding: 6 }, writer, quiet);
  await sink.prepare();
  const consumer = new ProcessingConsumer(
    buffer,
    options.remover ?? new FakeRemover(),
    sink,
    coordinator,
    { drainPolicy: options.drainPolicy ?? 'flush', statsInterval: options.statsInterval ?? 0 },
    quiet
  );
  return { buffer, coordinator, writer, consumer };
}

describe("ProcessingConsumer", () => {
  it("should skip a frame whose inference fails and write the rest in order", async () => {
    const remover = new FakeRemover(new Map([[3, new InferenceError("bad tensor")]]));
    const { buffer, writer, consumer } = await setup({ remover });
    const skipped: number[] = [];
    const records: string[] = [];
    const states: ConsumerState[] = [];
    consumer.events.on('skipped', ({ sequence }) => skipped.push(sequence));
    consumer.events.on('processed', (record) => records.push(path.basename(record.writtenPath)));
    consumer.events.on('state', (s) => states.push(s));

    for (const seq of [1, 2, 3, 4, 5]) buffer.tryEnqueue(frame(seq));
    await buffer.end();
    const report = await consumer.run();

    expect(writer.written).toEqual([1, 2, 4, 5]);
    expect(records).toEqual(["frame_000001.png", "frame_000002.png", "frame_000004.png", "frame_000005.png"]);
    expect(skipped).toEqual([3]);
    expect(report.processed).toBe(4);
    expect(report.failed).toBe(1);
    expect(report.lastProcessedSequence).toBe(5);
    expect(report.stop).toBeNull();
    expect(states).toEqual(['running', 'draining', 'terminated']);
  });

  it("should wrap unexpected remover errors as inference failures", async () => {
    const remover = new FakeRemover(new Map([[0, new Error("opaque")]]));
    const { buffer, consumer } = await setup({ remover });
    const errors: unknown[] = [];
    consumer.events.on('skipped', ({ error }) => errors.push(error));

    buffer.tryEnqueue(frame(0));
    await buffer.end();
    await consumer.run();

    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(InferenceError);
  });

  it("should wait for frames while the transport is empty", async () => {
    const { buffer, writer, consumer } = await setup();

    const running = consumer.run();
    await vi.waitFor(() => expect(consumer.state).toBe('running'));
    buffer.tryEnqueue(frame(0));
    await vi.waitFor(() => expect(writer.written).toEqual([0]));
    buffer.tryEnqueue(frame(1));
    await vi.waitFor(() => expect(writer.written).toEqual([0, 1]));
    await buffer.end();

    expect((await running).processed).toBe(2);
  });

  it("should finish buffered frames after a stop under the flush policy", async () => {
    const writer = new MemoryWriter();
    const release = writer.hold(0);
    const { buffer, coordinator, consumer } = await setup({ writer });

    buffer.tryEnqueue(frame(0));
    const running = consumer.run();
    await vi.waitFor(() => expect(writer.started).toEqual([0]));
    buffer.tryEnqueue(frame(1));
    buffer.tryEnqueue(frame(2));
    coordinator.requestStop('operator');
    release();
    const report = await running;

    expect(writer.written).toEqual([0, 1, 2]);
    expect(report.discarded).toBe(0);
    expect(report.stop?.reason).toBe('operator');
    expect(buffer.tryEnqueue(frame(3))).toEqual({ status: 'rejected', reason: 'closed' });
  });

  it("should only finish the in-flight frame under the discard policy", async () => {
    const writer = new MemoryWriter();
    const release = writer.hold(0);
    const { buffer, coordinator, consumer } = await setup({ writer, drainPolicy: 'discard' });

    buffer.tryEnqueue(frame(0));
    const running = consumer.run();
    await vi.waitFor(() => expect(writer.started).toEqual([0]));
    buffer.tryEnqueue(frame(1));
    buffer.tryEnqueue(frame(2));
    coordinator.requestStop('interrupt');
    release();
    const report = await running;

    expect(writer.written).toEqual([0]);
    expect(report.processed).toBe(1);
    expect(report.discarded).toBe(2);
  });

  it("should stop the pipeline when the remover is exhausted", async () => {
    const remover = new FakeRemover(new Map([[2, new ResourceExhaustedError("model unloaded")]]));
    const { buffer, coordinator, writer, consumer } = await setup({ remover });

    for (const seq of [0, 1, 2, 3]) buffer.tryEnqueue(frame(seq));
    const report = await consumer.run();

    expect(writer.written).toEqual([0, 1]);
    expect(report.error).toBeInstanceOf(ResourceExhaustedError);
    expect(coordinator.request?.reason).toBe('resource-exhausted');
    expect(consumer.state).toBe('terminated');
  });

  it("should count a failed write and keep going", async () => {
    const writer = new MemoryWriter(new Set([1]));
    const { buffer, consumer } = await setup({ writer });
    const errors: unknown[] = [];
    consumer.events.on('skipped', ({ error }) => errors.push(error));

    for (const seq of [0, 1, 2]) buffer.tryEnqueue(frame(seq));
    await buffer.end();
    const report = await consumer.run();

    expect(writer.written).toEqual([0, 2]);
    expect(report.writeFailed).toBe(1);
    expect(report.processed).toBe(2);
    expect(errors[0]).toBeInstanceOf(WriteError);
  });

  it("should log throughput every statsInterval frames", async () => {
    const logger = new RelayLogger({ level: 'info', format: 'json' });
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const buffer = new LatestFrameBuffer(8);
    const sink = new OutputSink({ dir: os.tmpdir(), reuseDirectory: true, sequencePadding: 6 }, new MemoryWriter(), logger);
    await sink.prepare();
    const consumer = new ProcessingConsumer(
      buffer, new FakeRemover(), sink, new ShutdownCoordinator(logger),
      { drainPolicy: 'flush', statsInterval: 2 }, logger, () => 1010
    );

    for (const seq of [0, 1, 2, 3, 4]) buffer.tryEnqueue(frame(seq));
    await buffer.end();
    await consumer.run();

    const messages = spy.mock.calls
      .map(call => JSON.parse(String(call[0])).msg)
      .filter((msg: string) => msg.startsWith("Processed "));
    expect(messages).toHaveLength(2);
    expect(messages[0]).toMatch(/^Processed 2 frames \| FPS: [\d.]+ \| lag: 9ms$/);
    expect(messages[1]).toMatch(/^Processed 4 frames \| FPS: [\d.]+ \| lag: 7ms$/);
  });
});
