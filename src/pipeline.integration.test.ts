import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PNG } from "pngjs";
import { parseConfig } from "./domains/config/config";
import type { RelayConfig } from "./domains/config/schema";
import { ShutdownCoordinator } from "./domains/shutdown/coordinator";
import { CapturePlugin } from "./domains/capture/capture.plugin";
import { ProcessingPlugin } from "./domains/processing/processing.plugin";
import { MockCamera } from "./domains/capture/drivers/mock-camera";
import { HeadlessDisplay } from "./domains/capture/drivers/headless-display";
import { RelayLogger } from "./domains/observability/logger";
import { exitCodeFor } from "./cli";

const quiet = new RelayLogger({ level: 'error', format: 'json' });

/**
 * Both processes of the pipeline in one test: mock camera → socket →
 * latest-frame buffer → chroma key → PNG files.
 */
describe("Capture to processing pipeline", () => {
  let root: string;
  let config: RelayConfig;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "frame-relay-e2e-"));
    config = parseConfig({
      transport: { socketPath: path.join(root, "relay.sock"), capacity: 8, connectRetries: 0 },
      camera: { width: 8, height: 6, fps: 100 },
      capture: { maxFrames: 5, statsInterval: 0 },
      processing: { statsInterval: 0 },
      output: { dir: path.join(root, "frames") },
      shutdown: { graceMs: 2000 },
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should write every captured frame with its background replaced and stop both sides", async () => {
    const processingSide = new ShutdownCoordinator(quiet);
    const captureSide = new ShutdownCoordinator(quiet);
    const processing = new ProcessingPlugin(config, processingSide, {}, quiet);
    const camera = new MockCamera("mock:e2e", { width: 8, height: 6, fps: 100 });
    const display = new HeadlessDisplay();
    const capture = new CapturePlugin(config, captureSide, { camera, display }, quiet);
    processing.setup();
    capture.setup();

    await processing.start();
    await capture.start();
    const produced = await capture.done;
    const consumed = await processing.done;
    await capture.stop();
    await processing.stop();

    expect(produced.stop?.reason).toBe('frame-limit');
    expect(produced.framesCaptured).toBe(5);
    expect(display.framesShown).toBe(5);
    expect(camera.isOpen).toBe(false);

    expect(processingSide.request).toMatchObject({ reason: 'peer-request', origin: 'peer' });
    expect(consumed.processed).toBe(5);
    expect(consumed.lastProcessedSequence).toBe(4);
    expect(exitCodeFor(produced)).toBe(0);
    expect(exitCodeFor(consumed)).toBe(0);

    const [runDir] = await readdir(path.join(root, "frames"));
    expect(runDir).toMatch(/^run_\d{8}-\d{6}-\d{3}$/);
    const files = await readdir(path.join(root, "frames", runDir));
    expect(files.sort()).toEqual([0, 1, 2, 3, 4].map(n => `frame_00000${n}.png`));

    // Frame 0 puts the subject square at x 0..1, y 2..3; the rest is key colour.
    const png = PNG.sync.read(await readFile(path.join(root, "frames", runDir, "frame_000000.png")));
    const pixel = (x: number, y: number) => Array.from(png.data.subarray((y * 8 + x) * 4, (y * 8 + x) * 4 + 4));
    expect(png.width).toBe(8);
    expect(png.height).toBe(6);
    expect(pixel(0, 0)).toEqual([192, 192, 192, 255]);
    expect(pixel(0, 2)).toEqual([200, 80, 60, 255]);
    expect(pixel(1, 3)).toEqual([200, 80, 60, 255]);
    expect(pixel(2, 2)).toEqual([192, 192, 192, 255]);
  });

  it("should stop capturing when the processing side goes away", async () => {
    const processingSide = new ShutdownCoordinator(quiet);
    const captureSide = new ShutdownCoordinator(quiet);
    const unlimited = { ...config, capture: { statsInterval: 0 } };
    const processing = new ProcessingPlugin(unlimited, processingSide, {}, quiet);
    const capture = new CapturePlugin(
      unlimited,
      captureSide,
      { camera: new MockCamera("mock:e2e", { width: 8, height: 6, fps: 100 }), display: new HeadlessDisplay() },
      quiet
    );

    await processing.start();
    await capture.start();
    processingSide.requestStop('operator');
    const produced = await capture.done;
    await processing.stop();
    await capture.stop();

    expect(captureSide.request?.origin).toBe('peer');
    expect(['peer-request', 'peer-disconnected']).toContain(produced.stop?.reason);
    expect(produced.error).toBeUndefined();
  });
});
