import { EventEmitter } from 'events';
import type { LinkTransport } from './transport.js';
import type { MessageFields, MessageName } from './messages.js';
import { encodeMessage, MAV_MODE_FLAG_SAFETY_ARMED } from './messages.js';

export interface DemoVehicleOptions {
  rateHz: number;
  latitude?: number;
  longitude?: number;
  random?: () => number;
}

const SYSTEM_ID = 1;
const COMPONENT_ID = 1;
const GUIDED_MODE = 4;
const BATTERY_DRAIN_PER_TICK = 0.01;

/**
 * Simulated vehicle. Emits real MAVLink v2 frames (heartbeat, position,
 * attitude, system status, GPS) so demo traffic takes the same parse / merge
 * / fan-out path as a live link.
 */
export class DemoTransport extends EventEmitter implements LinkTransport {
  private timer: ReturnType<typeof setInterval> | null = null;
  private sequence = 0;
  private tick = 0;
  private readonly random: () => number;

  private lat: number;
  private lon: number;
  private alt = 0;
  private yaw = 0;
  private battery = 100;

  constructor(private readonly options: DemoVehicleOptions) {
    super();
    this.random = options.random ?? Math.random;
    this.lat = options.latitude ?? 33.749;
    this.lon = options.longitude ?? -84.388;
  }

  get description() { return `demo (${this.options.rateHz} Hz)`; }

  open() {
    if (this.timer) return;
    setImmediate(() => this.emit('open'));
    this.timer = setInterval(() => this.step(), 1000 / this.options.rateHz);
  }

  close() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    setImmediate(() => this.emit('close', 'demo stopped'));
  }

  private step() {
    this.tick++;
    const jitter = (scale: number) => (this.random() - 0.5) * 2 * scale;

    this.lat += jitter(0.00005);
    this.lon += jitter(0.00005);
    this.alt = Math.max(0, this.alt + jitter(0.5) + 0.2);
    this.yaw = (this.yaw + jitter(2) + 360) % 360;
    this.battery = Math.max(0, this.battery - BATTERY_DRAIN_PER_TICK);

    const timeBootMs = Math.round((this.tick * 1000) / this.options.rateHz);
    const altMm = Math.round(this.alt * 1000);

    const frames = [
      this.frame('GLOBAL_POSITION_INT', {
        timeBootMs,
        lat: Math.round(this.lat * 1e7),
        lon: Math.round(this.lon * 1e7),
        alt: altMm + 300_000,
        relativeAlt: altMm,
        hdg: Math.round(this.yaw * 100),
      }),
      this.frame('ATTITUDE', {
        timeBootMs,
        roll: (jitter(5) * Math.PI) / 180,
        pitch: (jitter(5) * Math.PI) / 180,
        yaw: ((this.yaw > 180 ? this.yaw - 360 : this.yaw) * Math.PI) / 180,
      }),
    ];

    // Slower messages, as a flight controller streams them at lower rates.
    if (this.tick % 5 === 0) {
      frames.push(
        this.frame('SYS_STATUS', {
          voltageBattery: Math.round((11.8 + 0.8 * (this.battery / 100)) * 1000),
          currentBattery: Math.round((7 + this.random() * 8) * 100),
          batteryRemaining: Math.round(this.battery),
        }),
        this.frame('GPS_RAW_INT', {
          timeUsec: timeBootMs * 1000,
          lat: Math.round(this.lat * 1e7),
          lon: Math.round(this.lon * 1e7),
          alt: altMm,
          fixType: 6,
          satellitesVisible: 10 + Math.floor(this.random() * 6),
        }),
      );
    }
    if (this.tick % Math.max(1, Math.round(this.options.rateHz)) === 0) {
      frames.push(this.frame('HEARTBEAT', {
        type: 2,        // quadrotor
        autopilot: 3,   // ArduPilot
        baseMode: MAV_MODE_FLAG_SAFETY_ARMED | 0x01,
        customMode: GUIDED_MODE,
        systemStatus: 4,
      }));
    }

    this.emit('data', Buffer.concat(frames));
  }

  private frame<K extends MessageName>(name: K, fields: Partial<MessageFields[K]>): Buffer {
    return encodeMessage(name, fields, {
      sequence: this.sequence++ & 0xff,
      systemId: SYSTEM_ID,
      componentId: COMPONENT_ID,
    });
  }
}
