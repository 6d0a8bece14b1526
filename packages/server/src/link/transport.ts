import { EventEmitter } from 'events';
import { Socket } from 'net';
import dgram from 'dgram';

/**
 * Byte source for the link reader.
 *
 * Events:
 * - `open`: ready to receive
 * - `data` (Buffer): raw bytes from the flight controller
 * - `close` (reason): exactly once per `open()`, after a failure or `close()`
 */
export interface LinkTransport extends EventEmitter {
  readonly description: string;
  open(): void;
  close(): void;
}

export type LinkEndpoint =
  | { kind: 'udp'; host: string; port: number }
  | { kind: 'tcp'; host: string; port: number }
  | { kind: 'demo' };

/** TCP client, e.g. SITL on tcp:127.0.0.1:5760 or a serial-to-TCP bridge. */
export class TcpTransport extends EventEmitter implements LinkTransport {
  private socket: Socket | null = null;

  constructor(private readonly host: string, private readonly port: number) {
    super();
  }

  get description() { return `tcp://${this.host}:${this.port}`; }

  open() {
    const socket = new Socket();
    this.socket = socket;
    let lastError: string | undefined;

    socket.setNoDelay(true);

    socket.on('connect', () => {
      if (this.socket === socket) this.emit('open');
    });

    socket.on('data', (data: Buffer) => {
      if (this.socket === socket) this.emit('data', data);
    });

    socket.on('error', (err) => {
      lastError = err.message;
      console.error(`🛰️ Link ${this.description} error: ${err.message}`);
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.emit('close', lastError ?? 'connection closed');
    });

    socket.connect(this.port, this.host);
  }

  close() {
    this.socket?.destroy();
  }
}

/** Listens for datagrams on host:port, the way autopilots and routers push MAVLink over UDP. */
export class UdpTransport extends EventEmitter implements LinkTransport {
  private socket: dgram.Socket | null = null;

  constructor(private readonly host: string, private readonly port: number) {
    super();
  }

  get description() { return `udp://${this.host}:${this.port}`; }

  open() {
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    this.socket = socket;
    let lastError: string | undefined;

    socket.on('listening', () => {
      if (this.socket === socket) this.emit('open');
    });

    socket.on('message', (msg: Buffer) => {
      if (this.socket === socket) this.emit('data', msg);
    });

    socket.on('error', (err) => {
      lastError = err.message;
      console.error(`🛰️ Link ${this.description} error: ${err.message}`);
      this.shutdown(socket, () => lastError);
    });

    socket.on('close', () => {
      if (this.socket !== socket) return;
      this.socket = null;
      this.emit('close', lastError ?? 'socket closed');
    });

    socket.bind(this.port, this.host);
  }

  close() {
    if (this.socket) this.shutdown(this.socket, () => undefined);
  }

  private shutdown(socket: dgram.Socket, reason: () => string | undefined) {
    try {
      socket.close();
    } catch (err) {
      // Already closed or never bound; report the close ourselves.
      if (this.socket !== socket) return;
      this.socket = null;
      this.emit('close', reason() ?? (err instanceof Error ? err.message : 'socket closed'));
    }
  }
}

/**
 * Parse a link address. Accepts `udp://host:port`, `tcp://host:port`, the
 * short `udp:host:port` / `tcp:host:port` forms, and `demo`.
 */
export function parseLinkUrl(url: string): LinkEndpoint {
  const trimmed = url.trim();
  if (trimmed === 'demo') return { kind: 'demo' };

  const match = /^(udp|tcp):(?:\/\/)?([^:/]+):(\d+)\/?$/.exec(trimmed);
  if (!match) throw new Error(`Unsupported link address "${url}" (expected udp:host:port, tcp:host:port or demo)`);

  const [, kind, host, portText] = match;
  const port = parseInt(portText, 10);
  if (port < 1 || port > 65535) throw new Error(`Link port out of range in "${url}"`);
  return kind === 'udp' ? { kind: 'udp', host, port } : { kind: 'tcp', host, port };
}

export function describeEndpoint(endpoint: LinkEndpoint): string {
  return endpoint.kind === 'demo' ? 'demo' : `${endpoint.kind}://${endpoint.host}:${endpoint.port}`;
}
