/**
 * MAVLink framing: splits a byte stream into checked frames.
 *
 * Frame layouts:
 * - v1: 0xFE, len, seq, sysid, compid, msgid, payload[len], crc(2)
 * - v2: 0xFD, len, incompat, compat, seq, sysid, compid, msgid(3, LE),
 *       payload[len], crc(2), signature(13, only when incompat & 0x01)
 *
 * The checksum is CRC-16/MCRF4XX over everything after the magic byte,
 * followed by the message's CRC_EXTRA seed. v2 senders trim trailing zero
 * bytes from the payload; the parser pads them back to the declared length.
 *
 * Works on plain Buffers; no protocol library involved.
 */

export const MAVLINK_V1_MAGIC = 0xfe;
export const MAVLINK_V2_MAGIC = 0xfd;

const V1_HEADER_LEN = 6;
const V2_HEADER_LEN = 10;
const CHECKSUM_LEN = 2;
const SIGNATURE_LEN = 13;
const IFLAG_SIGNED = 0x01;

export interface MessageInfo {
  crcExtra: number;
  length: number;   // full (untruncated) payload length
}

export interface MavlinkFrame {
  version: 1 | 2;
  sequence: number;
  systemId: number;
  componentId: number;
  messageId: number;
  payload: Buffer;
  signed: boolean;
}

export interface FrameHeader {
  sequence: number;
  systemId: number;
  componentId: number;
  version?: 1 | 2;
}

export interface ParserStats {
  frames: number;
  crcErrors: number;
  unknownMessages: number;
  bytesDiscarded: number;
}

export function crcAccumulate(byte: number, crc: number): number {
  let tmp = (byte ^ (crc & 0xff)) & 0xff;
  tmp = (tmp ^ (tmp << 4)) & 0xff;
  return ((crc >> 8) ^ (tmp << 8) ^ (tmp << 3) ^ (tmp >> 4)) & 0xffff;
}

export function crcX25(data: Uint8Array, crc = 0xffff): number {
  for (const byte of data) crc = crcAccumulate(byte, crc);
  return crc;
}

export function encodeFrame(messageId: number, payload: Buffer, info: MessageInfo, header: FrameHeader): Buffer {
  const version = header.version ?? 2;
  let body = payload;

  let head: Buffer;
  if (version === 2) {
    let len = body.length;
    while (len > 1 && body[len - 1] === 0) len--;
    body = body.subarray(0, len);
    head = Buffer.from([
      MAVLINK_V2_MAGIC, body.length, 0, 0,
      header.sequence & 0xff, header.systemId & 0xff, header.componentId & 0xff,
      messageId & 0xff, (messageId >> 8) & 0xff, (messageId >> 16) & 0xff,
    ]);
  } else {
    if (messageId > 0xff) throw new Error(`Message id ${messageId} does not fit a MAVLink v1 frame`);
    head = Buffer.from([
      MAVLINK_V1_MAGIC, body.length,
      header.sequence & 0xff, header.systemId & 0xff, header.componentId & 0xff,
      messageId,
    ]);
  }

  let crc = crcX25(head.subarray(1));
  crc = crcX25(body, crc);
  crc = crcAccumulate(info.crcExtra, crc);

  const checksum = Buffer.alloc(CHECKSUM_LEN);
  checksum.writeUInt16LE(crc, 0);
  return Buffer.concat([head, body, checksum]);
}

type DecodeResult =
  | { kind: 'frame'; frame: MavlinkFrame }
  | { kind: 'unknown' }
  | { kind: 'corrupt' };

/**
 * Streaming frame splitter. Feed it chunks as they arrive; it returns the
 * complete frames with a valid checksum and keeps any partial frame for the
 * next chunk. Corrupt frames are skipped by resynchronizing on the next
 * magic byte. Frames whose message id the lookup does not know cannot be
 * checked and are skipped whole.
 */
export class MavlinkParser {
  private buffer: Buffer = Buffer.alloc(0);
  private counters: ParserStats = { frames: 0, crcErrors: 0, unknownMessages: 0, bytesDiscarded: 0 };

  constructor(private readonly lookup: (messageId: number) => MessageInfo | undefined) {}

  get stats(): ParserStats {
    return { ...this.counters };
  }

  reset() {
    this.buffer = Buffer.alloc(0);
  }

  push(chunk: Buffer): MavlinkFrame[] {
    this.buffer = this.buffer.length > 0 ? Buffer.concat([this.buffer, chunk]) : chunk;
    const frames: MavlinkFrame[] = [];

    while (this.buffer.length > 0) {
      const start = this.findMagic();
      if (start < 0) {
        this.discard(this.buffer.length);
        break;
      }
      if (start > 0) this.discard(start);

      if (this.buffer.length < 3) break; // Need more data
      const payloadLen = this.buffer[1];
      const frameLen = this.buffer[0] === MAVLINK_V1_MAGIC
        ? V1_HEADER_LEN + payloadLen + CHECKSUM_LEN
        : V2_HEADER_LEN + payloadLen + CHECKSUM_LEN + ((this.buffer[2] & IFLAG_SIGNED) ? SIGNATURE_LEN : 0);
      if (this.buffer.length < frameLen) break; // Need more data

      const result = this.decode(this.buffer.subarray(0, frameLen));
      switch (result.kind) {
        case 'frame':
          frames.push(result.frame);
          this.counters.frames++;
          this.buffer = this.buffer.subarray(frameLen);
          break;
        case 'unknown':
          this.counters.unknownMessages++;
          this.buffer = this.buffer.subarray(frameLen);
          break;
        case 'corrupt':
          this.counters.crcErrors++;
          this.discard(1);
          break;
      }
    }

    return frames;
  }

  private findMagic(): number {
    for (let i = 0; i < this.buffer.length; i++) {
      const b = this.buffer[i];
      if (b === MAVLINK_V1_MAGIC || b === MAVLINK_V2_MAGIC) return i;
    }
    return -1;
  }

  private discard(count: number) {
    this.counters.bytesDiscarded += count;
    this.buffer = this.buffer.subarray(count);
  }

  private decode(raw: Buffer): DecodeResult {
    const v2 = raw[0] === MAVLINK_V2_MAGIC;
    const payloadLen = raw[1];
    const headerLen = v2 ? V2_HEADER_LEN : V1_HEADER_LEN;

    if (v2 && (raw[2] & ~IFLAG_SIGNED) !== 0) return { kind: 'corrupt' };

    const messageId = v2 ? raw[7] | (raw[8] << 8) | (raw[9] << 16) : raw[5];
    const info = this.lookup(messageId);
    if (!info) return { kind: 'unknown' };

    const crcEnd = headerLen + payloadLen;
    let crc = crcX25(raw.subarray(1, crcEnd));
    crc = crcAccumulate(info.crcExtra, crc);
    if (crc !== raw.readUInt16LE(crcEnd)) return { kind: 'corrupt' };

    const body = raw.subarray(headerLen, crcEnd);
    const payload = Buffer.alloc(Math.max(info.length, payloadLen));
    body.copy(payload);

    return {
      kind: 'frame',
      frame: {
        version: v2 ? 2 : 1,
        sequence: v2 ? raw[4] : raw[2],
        systemId: v2 ? raw[5] : raw[3],
        componentId: v2 ? raw[6] : raw[4],
        messageId,
        payload,
        signed: v2 && (raw[2] & IFLAG_SIGNED) !== 0,
      },
    };
  }
}
