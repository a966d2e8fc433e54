import { describe, it, expect } from "vitest";
import {
  MAGIC, PacketType, Protocol, VERSION,
  frameFromPayload, parseHello, parseShutdown,
} from "./protocol";
import { createFrame } from "../frame/frame";
import { ProtocolError } from "../../core/errors";

describe("Protocol", () => {
  it("should write an 8-byte header ahead of the body", () => {
    const packet = Protocol.encodeShutdown("operator");

    expect(packet.readUInt16BE(0)).toBe(MAGIC);
    expect(packet.readUInt8(2)).toBe(VERSION);
    expect(packet.readUInt8(3)).toBe(PacketType.SHUTDOWN);
    expect(packet.readUInt32BE(4)).toBe(packet.length - 8);
  });

  it("should return null until a whole packet is buffered", () => {
    const packet = Protocol.encodeShutdown("operator");

    expect(Protocol.decode(packet.subarray(0, 5))).toBeNull();
    expect(Protocol.decode(packet.subarray(0, packet.length - 1))).toBeNull();

    const result = Protocol.decode(packet);
    expect(result?.consumed).toBe(packet.length);
    expect(result?.packet.type).toBe(PacketType.SHUTDOWN);
    expect(parseShutdown(result?.packet.payload)).toEqual({ reason: "operator" });
  });

  it("should split back-to-back packets", () => {
    const stream = Buffer.concat([
      Protocol.encodeHello({ width: 4, height: 2, channels: 3 }, 1234),
      Protocol.encodeShutdown("interrupt"),
    ]);

    const first = Protocol.decode(stream);
    expect(first?.packet.type).toBe(PacketType.HELLO);
    expect(parseHello(first?.packet.payload)).toEqual({
      role: "capture",
      pid: 1234,
      format: { width: 4, height: 2, channels: 3 },
    });

    const second = Protocol.decode(stream.subarray(first?.consumed ?? 0));
    expect(second?.packet.type).toBe(PacketType.SHUTDOWN);
  });

  it("should carry frame pixels and metadata", () => {
    const data = Uint8Array.from([1, 2, 3, 4, 5, 6]);
    const frame = createFrame(12, 1700.5, { width: 2, height: 1, channels: 3, data });

    const decoded = Protocol.decode(Protocol.encodeFrame(frame));
    const rebuilt = frameFromPayload(decoded?.packet.payload);

    expect(rebuilt.sequence).toBe(12);
    expect(rebuilt.capturedAt).toBe(1700.5);
    expect(rebuilt.image).toMatchObject({ width: 2, height: 1, channels: 3 });
    expect(Array.from(rebuilt.image.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("should reject bad magic, version and type", () => {
    const good = Protocol.encodeShutdown("x");

    const badMagic = Buffer.from(good);
    badMagic.writeUInt16BE(0x1234, 0);
    expect(() => Protocol.decode(badMagic)).toThrow(ProtocolError);

    const badVersion = Buffer.from(good);
    badVersion.writeUInt8(9, 2);
    expect(() => Protocol.decode(badVersion)).toThrow("Unsupported version: 9");

    const badType = Buffer.from(good);
    badType.writeUInt8(0x7f, 3);
    expect(() => Protocol.decode(badType)).toThrow("Unknown packet type: 127");
  });

  it("should reject malformed frame envelopes", () => {
    expect(() => frameFromPayload({ sequence: -1 })).toThrow(ProtocolError);
    expect(() => frameFromPayload({
      sequence: 1, capturedAt: 0, width: 1, height: 1, channels: 2, data: new Uint8Array(2),
    })).toThrow(/channels/);
  });

  it("should leave pixel-length checks to the processing stage", () => {
    const frame = frameFromPayload({
      sequence: 3, capturedAt: 0, width: 4, height: 4, channels: 3, data: new Uint8Array(5),
    });
    expect(frame.image.data.length).toBe(5);
  });
});
