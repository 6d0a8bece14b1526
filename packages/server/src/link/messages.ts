import type { MavlinkFrame, MessageInfo, FrameHeader } from './mavlink.js';
import { encodeFrame } from './mavlink.js';

// Payload fields are listed in wire order (MAVLink sorts them by type size).

export interface Heartbeat {
  customMode: number;
  type: number;
  autopilot: number;
  baseMode: number;
  systemStatus: number;
  mavlinkVersion: number;
}

export interface SysStatus {
  sensorsPresent: number;
  sensorsEnabled: number;
  sensorsHealth: number;
  load: number;
  voltageBattery: number;   // mV, 0xFFFF = unknown
  currentBattery: number;   // cA, -1 = unknown
  dropRateComm: number;
  errorsComm: number;
  batteryRemaining: number; // %, -1 = unknown
}

export interface GpsRawInt {
  timeUsec: number;
  lat: number;              // degE7
  lon: number;              // degE7
  alt: number;              // mm
  eph: number;
  epv: number;
  vel: number;
  cog: number;
  fixType: number;
  satellitesVisible: number; // 255 = unknown
}

export interface Attitude {
  timeBootMs: number;
  roll: number;   // rad
  pitch: number;  // rad
  yaw: number;    // rad
  rollspeed: number;
  pitchspeed: number;
  yawspeed: number;
}

export interface GlobalPositionInt {
  timeBootMs: number;
  lat: number;          // degE7
  lon: number;          // degE7
  alt: number;          // mm, MSL
  relativeAlt: number;  // mm above home
  vx: number;
  vy: number;
  vz: number;
  hdg: number;
}

export interface BatteryStatus {
  currentConsumed: number;
  energyConsumed: number;
  temperature: number;
  currentBattery: number;
  id: number;
  batteryFunction: number;
  type: number;
  batteryRemaining: number; // %, -1 = unknown
}

export interface MessageFields {
  HEARTBEAT: Heartbeat;
  SYS_STATUS: SysStatus;
  GPS_RAW_INT: GpsRawInt;
  ATTITUDE: Attitude;
  GLOBAL_POSITION_INT: GlobalPositionInt;
  BATTERY_STATUS: BatteryStatus;
}

export type MessageName = keyof MessageFields;

export type MavlinkMessage = {
  [K in MessageName]: { name: K; systemId: number; componentId: number; fields: MessageFields[K] };
}[MessageName];

interface MessageCodec<T> extends MessageInfo {
  id: number;
  decode(p: Buffer): T;
  encode(fields: Partial<T>): Buffer;
}

export const MAV_TYPE_GCS = 6;
export const MAV_MODE_FLAG_SAFETY_ARMED = 0x80;

const CODECS: { [K in MessageName]: MessageCodec<MessageFields[K]> } = {
  HEARTBEAT: {
    id: 0, crcExtra: 50, length: 9,
    decode: (p) => ({
      customMode: p.readUInt32LE(0),
      type: p.readUInt8(4),
      autopilot: p.readUInt8(5),
      baseMode: p.readUInt8(6),
      systemStatus: p.readUInt8(7),
      mavlinkVersion: p.readUInt8(8),
    }),
    encode: (f) => {
      const p = Buffer.alloc(9);
      p.writeUInt32LE(f.customMode ?? 0, 0);
      p.writeUInt8(f.type ?? 0, 4);
      p.writeUInt8(f.autopilot ?? 0, 5);
      p.writeUInt8(f.baseMode ?? 0, 6);
      p.writeUInt8(f.systemStatus ?? 0, 7);
      p.writeUInt8(f.mavlinkVersion ?? 3, 8);
      return p;
    },
  },
  SYS_STATUS: {
    id: 1, crcExtra: 124, length: 31,
    decode: (p) => ({
      sensorsPresent: p.readUInt32LE(0),
      sensorsEnabled: p.readUInt32LE(4),
      sensorsHealth: p.readUInt32LE(8),
      load: p.readUInt16LE(12),
      voltageBattery: p.readUInt16LE(14),
      currentBattery: p.readInt16LE(16),
      dropRateComm: p.readUInt16LE(18),
      errorsComm: p.readUInt16LE(20),
      batteryRemaining: p.readInt8(30),
    }),
    encode: (f) => {
      const p = Buffer.alloc(31);
      p.writeUInt32LE(f.sensorsPresent ?? 0, 0);
      p.writeUInt32LE(f.sensorsEnabled ?? 0, 4);
      p.writeUInt32LE(f.sensorsHealth ?? 0, 8);
      p.writeUInt16LE(f.load ?? 0, 12);
      p.writeUInt16LE(f.voltageBattery ?? 0xffff, 14);
      p.writeInt16LE(f.currentBattery ?? -1, 16);
      p.writeUInt16LE(f.dropRateComm ?? 0, 18);
      p.writeUInt16LE(f.errorsComm ?? 0, 20);
      p.writeInt8(f.batteryRemaining ?? -1, 30);
      return p;
    },
  },
  GPS_RAW_INT: {
    id: 24, crcExtra: 24, length: 30,
    decode: (p) => ({
      timeUsec: Number(p.readBigUInt64LE(0)),
      lat: p.readInt32LE(8),
      lon: p.readInt32LE(12),
      alt: p.readInt32LE(16),
      eph: p.readUInt16LE(20),
      epv: p.readUInt16LE(22),
      vel: p.readUInt16LE(24),
      cog: p.readUInt16LE(26),
      fixType: p.readUInt8(28),
      satellitesVisible: p.readUInt8(29),
    }),
    encode: (f) => {
      const p = Buffer.alloc(30);
      p.writeBigUInt64LE(BigInt(f.timeUsec ?? 0), 0);
      p.writeInt32LE(f.lat ?? 0, 8);
      p.writeInt32LE(f.lon ?? 0, 12);
      p.writeInt32LE(f.alt ?? 0, 16);
      p.writeUInt16LE(f.eph ?? 0xffff, 20);
      p.writeUInt16LE(f.epv ?? 0xffff, 22);
      p.writeUInt16LE(f.vel ?? 0xffff, 24);
      p.writeUInt16LE(f.cog ?? 0xffff, 26);
      p.writeUInt8(f.fixType ?? 0, 28);
      p.writeUInt8(f.satellitesVisible ?? 255, 29);
      return p;
    },
  },
  ATTITUDE: {
    id: 30, crcExtra: 39, length: 28,
    decode: (p) => ({
      timeBootMs: p.readUInt32LE(0),
      roll: p.readFloatLE(4),
      pitch: p.readFloatLE(8),
      yaw: p.readFloatLE(12),
      rollspeed: p.readFloatLE(16),
      pitchspeed: p.readFloatLE(20),
      yawspeed: p.readFloatLE(24),
    }),
    encode: (f) => {
      const p = Buffer.alloc(28);
      p.writeUInt32LE(f.timeBootMs ?? 0, 0);
      p.writeFloatLE(f.roll ?? 0, 4);
      p.writeFloatLE(f.pitch ?? 0, 8);
      p.writeFloatLE(f.yaw ?? 0, 12);
      p.writeFloatLE(f.rollspeed ?? 0, 16);
      p.writeFloatLE(f.pitchspeed ?? 0, 20);
      p.writeFloatLE(f.yawspeed ?? 0, 24);
      return p;
    },
  },
  GLOBAL_POSITION_INT: {
    id: 33, crcExtra: 104, length: 28,
    decode: (p) => ({
      timeBootMs: p.readUInt32LE(0),
      lat: p.readInt32LE(4),
      lon: p.readInt32LE(8),
      alt: p.readInt32LE(12),
      relativeAlt: p.readInt32LE(16),
      vx: p.readInt16LE(20),
      vy: p.readInt16LE(22),
      vz: p.readInt16LE(24),
      hdg: p.readUInt16LE(26),
    }),
    encode: (f) => {
      const p = Buffer.alloc(28);
      p.writeUInt32LE(f.timeBootMs ?? 0, 0);
      p.writeInt32LE(f.lat ?? 0, 4);
      p.writeInt32LE(f.lon ?? 0, 8);
      p.writeInt32LE(f.alt ?? 0, 12);
      p.writeInt32LE(f.relativeAlt ?? 0, 16);
      p.writeInt16LE(f.vx ?? 0, 20);
      p.writeInt16LE(f.vy ?? 0, 22);
      p.writeInt16LE(f.vz ?? 0, 24);
      p.writeUInt16LE(f.hdg ?? 0xffff, 26);
      return p;
    },
  },
  BATTERY_STATUS: {
    id: 147, crcExtra: 154, length: 36,
    decode: (p) => ({
      currentConsumed: p.readInt32LE(0),
      energyConsumed: p.readInt32LE(4),
      temperature: p.readInt16LE(8),
      currentBattery: p.readInt16LE(30),
      id: p.readUInt8(32),
      batteryFunction: p.readUInt8(33),
      type: p.readUInt8(34),
      batteryRemaining: p.readInt8(35),
    }),
    encode: (f) => {
      const p = Buffer.alloc(36);
      p.writeInt32LE(f.currentConsumed ?? -1, 0);
      p.writeInt32LE(f.energyConsumed ?? -1, 4);
      p.writeInt16LE(f.temperature ?? 0x7fff, 8);
      p.fill(0xff, 10, 30); // cell voltages: all unknown
      p.writeInt16LE(f.currentBattery ?? -1, 30);
      p.writeUInt8(f.id ?? 0, 32);
      p.writeUInt8(f.batteryFunction ?? 0, 33);
      p.writeUInt8(f.type ?? 0, 34);
      p.writeInt8(f.batteryRemaining ?? -1, 35);
      return p;
    },
  },
};

const INFO_BY_ID = new Map<number, MessageInfo>(
  Object.values(CODECS).map(c => [c.id, { crcExtra: c.crcExtra, length: c.length }]),
);

export function lookupMessage(messageId: number): MessageInfo | undefined {
  return INFO_BY_ID.get(messageId);
}

/** Decode a checked frame into one of the supported messages, or null if the id is not one of them. */
export function decodeMessage(frame: MavlinkFrame): MavlinkMessage | null {
  const { systemId, componentId, payload: p } = frame;
  switch (frame.messageId) {
    case CODECS.HEARTBEAT.id:
      return { name: 'HEARTBEAT', systemId, componentId, fields: CODECS.HEARTBEAT.decode(p) };
    case CODECS.SYS_STATUS.id:
      return { name: 'SYS_STATUS', systemId, componentId, fields: CODECS.SYS_STATUS.decode(p) };
    case CODECS.GPS_RAW_INT.id:
      return { name: 'GPS_RAW_INT', systemId, componentId, fields: CODECS.GPS_RAW_INT.decode(p) };
    case CODECS.ATTITUDE.id:
      return { name: 'ATTITUDE', systemId, componentId, fields: CODECS.ATTITUDE.decode(p) };
    case CODECS.GLOBAL_POSITION_INT.id:
      return { name: 'GLOBAL_POSITION_INT', systemId, componentId, fields: CODECS.GLOBAL_POSITION_INT.decode(p) };
    case CODECS.BATTERY_STATUS.id:
      return { name: 'BATTERY_STATUS', systemId, componentId, fields: CODECS.BATTERY_STATUS.decode(p) };
    default:
      return null;
  }
}

/** Encode one message as a complete frame. Unset fields take their "unknown" or zero value. */
export function encodeMessage<K extends MessageName>(
  name: K,
  fields: Partial<MessageFields[K]>,
  header: FrameHeader,
): Buffer {
  const codec: MessageCodec<MessageFields[K]> = CODECS[name];
  return encodeFrame(codec.id, codec.encode(fields), codec, header);
}
