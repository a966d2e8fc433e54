import net from 'node:net';
import { unlink } from 'node:fs/promises';
import mitt, { type Emitter } from 'mitt';
import { Protocol, PacketType, frameFromPayload, parseHello, parseShutdown, type HelloPayload, type Packet } from './protocol';
import { describeEndpoint, type Endpoint } from './endpoint';
import type { FrameChannel } from './types';
import type { Frame } from '../frame/types';
import type { ShutdownCoordinator } from '../shutdown/coordinator';
import type { Logger } from '../observability/types';
import { rootLogger } from '../observability/logger';

type FrameServerEvents = {
  connected: { remote: string };
  hello: HelloPayload;
  disconnected: { remote: string; expected: boolean };
  malformed: { error: Error };
};

/**
 * Processing-side endpoint. Accepts a single producer connection at a time,
 * reassembles packets and feeds frames into the local channel. Shutdown is
 * broadcast both ways: an inbound SHUTDOWN stops this process, a local stop
 * is sent to the producer.
 */
export class FrameServer {
  public readonly events: Emitter<FrameServerEvents> = mitt<FrameServerEvents>();
  private server: net.Server | null = null;
  private producer: net.Socket | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private peerSentShutdown = false;
  private malformedFrames = 0;
  private readonly log: Logger;
  private unsubscribeStop: (() => void) | null = null;

  constructor(
    private readonly endpoint: Endpoint,
    private readonly channel: FrameChannel,
    private readonly coordinator: ShutdownCoordinator,
    logger: Logger = rootLogger,
    private readonly closeTimeoutMs = 1000
  ) {
    this.log = logger.child({ component: 'FrameServer' });
  }

  get hasProducer(): boolean {
    return this.producer !== null;
  }

  get malformed(): number {
    return this.malformedFrames;
  }

  async start(): Promise<void> {
    if (this.endpoint.kind === 'unix') {
      // Stale socket file from a previous run.
      await unlink(this.endpoint.path).catch((e: NodeJS.ErrnoException) => {
        if (e.code !== 'ENOENT') throw e;
      });
    }

    const server = net.createServer(socket => this.accept(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      const onListening = () => {
        server.off('error', reject);
        server.on('error', (e) => this.log.error('Server error', e));
        resolve();
      };
      if (this.endpoint.kind === 'unix') {
        server.listen(this.endpoint.path, onListening);
      } else {
        server.listen(this.endpoint.port, this.endpoint.host, onListening);
      }
    });

    this.unsubscribeStop = this.coordinator.onStop(request => {
      if (request.origin === 'local') this.sendShutdown(request.reason);
    });

    this.log.info(`Listening on ${describeEndpoint(this.endpoint)}`);
  }

  private accept(socket: net.Socket) {
    const remote = socket.remoteAddress ?? 'local';
    if (this.producer) {
      this.log.warn('Refusing second producer connection', { remote });
      this.refuse(socket, 'busy');
      return;
    }
    if (this.coordinator.isStopRequested()) {
      this.log.warn('Refusing producer connection during shutdown', { remote });
      this.refuse(socket, this.coordinator.request?.reason ?? 'fatal');
      return;
    }

    this.producer = socket;
    this.buffer = Buffer.alloc(0);
    this.peerSentShutdown = false;
    this.log.info('Producer connected', { remote });
    this.events.emit('connected', { remote });

    socket.on('data', (data) => this.handleData(socket, data));
    socket.on('error', (error) => {
      this.log.error('Producer socket error', error);
    });
    socket.on('close', () => this.handleClose(socket, remote));
  }

  /** Tells the peer to stop, then closes. Whatever it already sent is discarded. */
  private refuse(socket: net.Socket, reason: string) {
    socket.on('error', (error) => this.log.debug('Refused connection failed', { error: error.message }));
    socket.resume();
    socket.end(Protocol.encodeShutdown(reason));
  }

  private handleData(socket: net.Socket, data: Buffer) {
    this.buffer = Buffer.concat([this.buffer, data]);

    try {
      while (true) {
        const result = Protocol.decode(this.buffer);
        if (!result) break;
        const { packet, consumed } = result;
        this.buffer = this.buffer.subarray(consumed);
        this.processPacket(packet);
      }
    } catch (e) {
      this.log.error('Protocol error, closing producer connection', e);
      socket.destroy();
    }
  }

  private processPacket(packet: Packet) {
    switch (packet.type) {
      case PacketType.HELLO: {
        const hello = parseHello(packet.payload);
        const { width, height, channels } = hello.format;
        this.log.info(`Producer ${hello.pid} streaming ${width}x${height}x${channels}`);
        this.events.emit('hello', hello);
        return;
      }
      case PacketType.FRAME: {
        let frame: Frame;
        try {
          frame = frameFromPayload(packet.payload);
        } catch (e) {
          this.malformedFrames++;
          const error = e instanceof Error ? e : new Error(String(e));
          this.log.warn('Skipping malformed frame', { error: error.message });
          this.events.emit('malformed', { error });
          return;
        }
        const outcome = this.channel.tryEnqueue(frame);
        if (outcome.status === 'replaced') {
          this.log.debug(`Dropped frame ${outcome.dropped.sequence} for ${frame.sequence}`);
        } else if (outcome.status === 'rejected') {
          this.log.debug(`Frame ${frame.sequence} rejected (${outcome.reason})`);
        }
        return;
      }
      case PacketType.SHUTDOWN: {
        const { reason } = parseShutdown(packet.payload);
        this.peerSentShutdown = true;
        this.log.info(`Producer requested shutdown (${reason})`);
        this.coordinator.requestStop('peer-request', 'peer');
        return;
      }
    }
  }

  private handleClose(socket: net.Socket, remote: string) {
    if (this.producer !== socket) return;
    this.producer = null;
    this.buffer = Buffer.alloc(0);
    const expected = this.peerSentShutdown || this.coordinator.isStopRequested();
    this.events.emit('disconnected', { remote, expected });
    if (expected) {
      this.log.info('Producer disconnected');
    } else {
      this.log.warn('Producer disconnected without shutdown');
      this.coordinator.requestStop('peer-disconnected', 'peer');
    }
  }

  private sendShutdown(reason: string) {
    const socket = this.producer;
    if (!socket || socket.destroyed || this.peerSentShutdown) return;
    try {
      socket.write(Protocol.encodeShutdown(reason));
    } catch (e) {
      this.log.error('Failed to send shutdown to producer', e);
    }
  }

  async stop(): Promise<void> {
    this.unsubscribeStop?.();
    this.unsubscribeStop = null;

    const socket = this.producer;
    if (socket && !socket.destroyed) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => socket.destroy(), this.closeTimeoutMs);
        socket.once('close', () => {
          clearTimeout(timer);
          resolve();
        });
        socket.end();
      });
    }

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    this.log.info('Stopped');
  }
}
