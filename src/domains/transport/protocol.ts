import { pack, unpack } from 'msgpackr';
import { z } from 'zod';
import { ProtocolError } from '../../core/errors';
import { createFrame, isChannelCount } from '../frame/frame';
import type { Frame, StreamFormat } from '../frame/types';

export const MAGIC = 0x4652; // 'FR'
export const VERSION = 1;

export enum PacketType {
  HELLO = 0x01,
  FRAME = 0x02,
  SHUTDOWN = 0x03,
}

export interface Packet {
  type: PacketType;
  payload: unknown;
}

const HEADER_SIZE = 8; // Magic(2) + Version(1) + Type(1) + Length(4)

// A 4K RGBA frame is ~33 MB; anything far beyond that is a corrupt header.
export const MAX_BODY_SIZE = 64 * 1024 * 1024;

const channelsSchema = z.number().int().refine(isChannelCount, 'channels must be 1, 3 or 4');

export const helloSchema = z.object({
  role: z.literal('capture'),
  pid: z.number().int(),
  format: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    channels: channelsSchema,
  }),
});

export const framePayloadSchema = z.object({
  sequence: z.number().int().nonnegative(),
  capturedAt: z.number(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  channels: channelsSchema,
  data: z.instanceof(Uint8Array),
});

export const shutdownSchema = z.object({
  reason: z.string(),
});

export type HelloPayload = z.infer<typeof helloSchema>;
export type FramePayload = z.infer<typeof framePayloadSchema>;
export type ShutdownPayload = z.infer<typeof shutdownSchema>;

export class Protocol {
  static encode(type: PacketType, payload: unknown): Buffer {
    const body = pack(payload);
    const length = body.length;
    const header = Buffer.alloc(HEADER_SIZE);

    header.writeUInt16BE(MAGIC, 0);
    header.writeUInt8(VERSION, 2);
    header.writeUInt8(type, 3);
    header.writeUInt32BE(length, 4);

    return Buffer.concat([header, body]);
  }

  static decode(buffer: Buffer): { packet: Packet, consumed: number } | null {
    if (buffer.length < HEADER_SIZE) return null;

    const magic = buffer.readUInt16BE(0);
    if (magic !== MAGIC) {
      throw new ProtocolError('Invalid magic bytes');
    }

    const version = buffer.readUInt8(2);
    if (version !== VERSION) {
      throw new ProtocolError(`Unsupported version: ${version}`);
    }

    const type = buffer.readUInt8(3);
    if (!isPacketType(type)) {
      throw new ProtocolError(`Unknown packet type: ${type}`);
    }

    const length = buffer.readUInt32BE(4);
    if (length > MAX_BODY_SIZE) {
      throw new ProtocolError(`Packet body too large: ${length} bytes`);
    }

    if (buffer.length < HEADER_SIZE + length) {
      return null; // Not enough data
    }

    const payloadBuffer = buffer.subarray(HEADER_SIZE, HEADER_SIZE + length);
    let payload: unknown;
    try {
      payload = unpack(payloadBuffer);
    } catch (e) {
      throw new ProtocolError('Undecodable packet body', { cause: e });
    }

    return {
      packet: { type, payload },
      consumed: HEADER_SIZE + length
    };
  }

  static encodeHello(format: StreamFormat, pid: number = process.pid): Buffer {
    const hello: HelloPayload = { role: 'capture', pid, format };
    return Protocol.encode(PacketType.HELLO, hello);
  }

  static encodeFrame(frame: Frame): Buffer {
    const { image } = frame;
    const payload: FramePayload = {
      sequence: frame.sequence,
      capturedAt: frame.capturedAt,
      width: image.width,
      height: image.height,
      channels: image.channels,
      data: image.data,
    };
    return Protocol.encode(PacketType.FRAME, payload);
  }

  static encodeShutdown(reason: string): Buffer {
    const payload: ShutdownPayload = { reason };
    return Protocol.encode(PacketType.SHUTDOWN, payload);
  }
}

function isPacketType(value: number): value is PacketType {
  return value === PacketType.HELLO || value === PacketType.FRAME || value === PacketType.SHUTDOWN;
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, what: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const detail = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ProtocolError(`Malformed ${what} payload: ${detail}`);
  }
  return result.data;
}

export function parseHello(payload: unknown): HelloPayload {
  return parse(helloSchema, payload, 'HELLO');
}

export function parseShutdown(payload: unknown): ShutdownPayload {
  return parse(shutdownSchema, payload, 'SHUTDOWN');
}

/**
 * Rebuilds a frame from its wire form. Only the envelope is checked here;
 * whether the pixel buffer matches its geometry is the processing stage's
 * concern.
 */
export function frameFromPayload(payload: unknown): Frame {
  const wire = parse(framePayloadSchema, payload, 'FRAME');
  return createFrame(wire.sequence, wire.capturedAt, {
    width: wire.width,
    height: wire.height,
    channels: wire.channels,
    data: wire.data,
  });
}
