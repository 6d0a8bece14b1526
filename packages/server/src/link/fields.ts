import type { TelemetryUpdate } from '@telemetry-bridge/shared';
import type { MavlinkMessage } from './messages.js';
import { MAV_TYPE_GCS, MAV_MODE_FLAG_SAFETY_ARMED } from './messages.js';

export type AltitudeReference = 'msl' | 'relative';

export interface ExtractOptions {
  altitude: AltitudeReference;
}

const UINT16_UNKNOWN = 0xffff;
const SATELLITES_UNKNOWN = 255;

function degrees(rad: number): number | undefined {
  return Number.isFinite(rad) ? (rad * 180) / Math.PI : undefined;
}

function percent(value: number): number | undefined {
  return value < 0 ? undefined : value;
}

/**
 * Map one decoded message onto the telemetry fields it actually carries.
 * MAVLink "unknown" sentinels are left out so the previous value survives
 * the merge.
 */
export function extractFields(msg: MavlinkMessage, options: ExtractOptions): TelemetryUpdate {
  switch (msg.name) {
    case 'GLOBAL_POSITION_INT': {
      const f = msg.fields;
      const altMm = options.altitude === 'relative' ? f.relativeAlt : f.alt;
      return { lat: f.lat / 1e7, lon: f.lon / 1e7, alt: altMm / 1000 };
    }
    case 'ATTITUDE': {
      const f = msg.fields;
      return { roll: degrees(f.roll), pitch: degrees(f.pitch), yaw: degrees(f.yaw) };
    }
    case 'SYS_STATUS': {
      const f = msg.fields;
      return {
        battery: percent(f.batteryRemaining),
        voltage: f.voltageBattery === UINT16_UNKNOWN ? undefined : f.voltageBattery / 1000,
        current: f.currentBattery === -1 ? undefined : f.currentBattery / 100,
      };
    }
    case 'BATTERY_STATUS':
      return { battery: percent(msg.fields.batteryRemaining) };
    case 'GPS_RAW_INT': {
      const f = msg.fields;
      return {
        fixType: f.fixType,
        satellites: f.satellitesVisible === SATELLITES_UNKNOWN ? undefined : f.satellitesVisible,
      };
    }
    case 'HEARTBEAT': {
      const f = msg.fields;
      // Ground stations send heartbeats too; they say nothing about the vehicle.
      if (f.type === MAV_TYPE_GCS) return {};
      return { armed: (f.baseMode & MAV_MODE_FLAG_SAFETY_ARMED) !== 0, customMode: f.customMode };
    }
  }
}
