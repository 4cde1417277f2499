import type { FieldValue } from "./values";

// Gateways add values over time. The lists below are the ones known today;
// anything else is kept as the raw string.
type Known<T extends readonly string[]> = T[number] | (string & {});

export const MESSAGE_TYPES = ["register", "heartbeat", "gps", "history", "status", "event"] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export const ACTIVITIES = ["unknown", "still", "walking", "running", "driving", "parked", "idling"] as const;
export type Activity = Known<typeof ACTIVITIES>;

export const TRANSMISSIONS = ["tcp", "udp", "http", "https", "sms"] as const;
export type Transmission = Known<typeof TRANSMISSIONS>;

export const DEVICE_IDENTIFIERS = ["imei", "code"] as const;
export type DeviceIdentifier = Known<typeof DEVICE_IDENTIFIERS>;

export const DATA_MODES = ["home_stop", "home_move", "roam_stop", "roam_move", "unknown_stop", "unknown_move"] as const;
export type DataMode = Known<typeof DATA_MODES>;

export const GSM_STATUS_FLAGS = ["engine", "network", "data", "connected", "voice_call", "roaming"] as const;
export type GsmStatusFlag = Known<typeof GSM_STATUS_FLAGS>;

export const GPS_FIX_FLAGS = [
    "fixed",
    "predicted",
    "diff_corrected",
    "last_known",
    "invalid_fix",
    "2d",
    "logged",
    "invalid_time"
] as const;
export type GpsFixFlag = Known<typeof GPS_FIX_FLAGS>;

/** The three fields read before deciding whether a message is worth decoding. */
export interface Envelope {
    messageVer: number | null;
    messageType: string | null;
    valid: boolean | null;
}

export interface Device {
    readonly identifier: DeviceIdentifier | null;
    readonly imei: string | null;      // set when identifier is "imei"
    readonly serialNo: string | null;  // set when identifier is "code"
    readonly firmVer: string | null;
    readonly type: string | null;      // e.g. teltonika
    readonly model: string | null;
}

export interface Network {
    readonly remoteIpv4: string | null;
    readonly remoteIpv6: string | null;
    readonly remotePort: number | null;
    readonly mac: string | null;
}

export interface GsmInfo {
    readonly cid: readonly number[];
    readonly lcid: readonly number[];
    readonly lac: readonly number[];
    readonly carrier: number | null;
    readonly rssi: readonly number[];   // dBm
    readonly mcc: readonly string[];
    readonly mnc: readonly string[];
    readonly rcpi: readonly number[];   // dBm
    readonly ssValue: number | null;    // raw, unit dependent
    readonly signalStr: number | null;  // percent
    readonly dataMode: DataMode | null;
    readonly status: ReadonlySet<GsmStatusFlag>;
}

export interface SimInfo {
    readonly msisdn: string | null;
    readonly iccid: string | null;
    readonly imsi: string | null;
}

export interface GpsFix {
    /** null until the unit has synced its clock with the satellites. */
    readonly timestamp: Date | null;

    readonly latitude: number;
    readonly longitude: number;
    readonly altitude: number;  // m
    readonly speed: number;     // km/h
    readonly heading: number;   // degrees
    readonly satellites: number;

    readonly activity: Activity | null;
    readonly odometer: number | null;
    readonly tripOdo: number | null;
    readonly gnss: boolean | null;

    readonly hdop: number | null;
    readonly vdop: number | null;
    readonly pdop: number | null;
    readonly tdop: number | null;

    readonly fix: ReadonlySet<GpsFixFlag>;
}

export interface EventField {
    readonly key: string;
    readonly value: FieldValue;
}

export interface TelemetryEvent {
    readonly code: string;            // e.g. HARSH_DRIVING:BRAKING
    readonly fields: readonly EventField[];
}

export interface SensorReading {
    readonly name: string;
    readonly value: FieldValue;
}

export interface ObdPid {
    readonly pid: number;
    readonly value: number;
}

export interface CanEntry {
    readonly id: number;
    readonly value: number;
}

export interface ObdII {
    readonly mode01: readonly ObdPid[];
}

/** A decoded `gps` message, version 1. */
export interface TelemetryRecord {
    readonly messageVer: number;
    readonly messageType: string;
    readonly gateway: string | null;
    readonly port: number | null;
    readonly transmission: Transmission | null;
    readonly timestamp: Date | null;  // received at the gateway
    readonly source: string | null;
    readonly seqNo: number | null;
    readonly valid: boolean;
    readonly activity: Activity | null;

    readonly device: Device;
    readonly network: Network | null;
    readonly gsm: readonly GsmInfo[];
    readonly sims: readonly SimInfo[];
    readonly gps: GpsFix;

    readonly events: readonly TelemetryEvent[];
    readonly sensors: readonly SensorReading[];

    readonly inputs: string | null;   // e.g. "11000000"
    readonly outputs: string | null;
    readonly auxInputs: readonly string[];
    readonly anInputs: readonly number[];

    readonly obdII: ObdII | null;
    readonly canBus: readonly CanEntry[];
}
