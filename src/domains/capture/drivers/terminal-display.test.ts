import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { setImmediate as tick } from "node:timers/promises";
import { TerminalDisplay, sampleLuma } from "./terminal-display";
import { HeadlessDisplay } from "./headless-display";
import type { RawImage } from "../../frame/types";

function solid(value: number): RawImage {
  return { width: 2, height: 2, channels: 3, data: new Uint8Array(12).fill(value) };
}

function setup(now: () => number = () => 0) {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on('data', (chunk: Buffer) => written.push(chunk.toString()));
  const display = new TerminalDisplay(input, output, { refreshMs: 100, now });
  return { input, display, written };
}

describe("TerminalDisplay", () => {
  it("should queue keypresses in order", async () => {
    const { input, display } = setup();

    input.write("x");
    input.write("q");
    await tick();

    expect(display.pollKey()).toEqual({ name: "x", ctrl: false });
    expect(display.pollKey()).toEqual({ name: "q", ctrl: false });
    expect(display.pollKey()).toBeNull();
    display.close();
  });

  it("should report Ctrl+C as a ctrl keypress", async () => {
    const { input, display } = setup();

    input.write("\u0003");
    await tick();

    expect(display.pollKey()).toEqual({ name: "c", ctrl: true });
    display.close();
  });

  it("should throttle status redraws to the refresh interval", async () => {
    let now = 0;
    const { display, written } = setup(() => now);

    display.show(solid(100), 0);
    now = 50;
    display.show(solid(100), 1);
    now = 150;
    display.show(solid(100), 2);
    await tick();

    expect(written).toEqual([
      "\r\x1b[2K#0 2x2 luma 100",
      "\r\x1b[2K#2 2x2 luma 100",
    ]);
    display.close();
  });
});

describe("sampleLuma", () => {
  it("should weight RGB channels", () => {
    const red: RawImage = { width: 1, height: 1, channels: 3, data: Uint8Array.from([255, 0, 0]) };
    expect(sampleLuma(red)).toBeCloseTo(76.245, 3);
  });

  it("should read gray images directly", () => {
    const gray: RawImage = { width: 2, height: 1, channels: 1, data: Uint8Array.from([10, 30]) };
    expect(sampleLuma(gray, 1)).toBe(20);
  });
});

describe("HeadlessDisplay", () => {
  it("should count frames and never report keys", () => {
    const display = new HeadlessDisplay();
    display.show(solid(0), 0);
    display.show(solid(0), 1);
    expect(display.framesShown).toBe(2);
    expect(display.pollKey()).toBeNull();
  });
});
