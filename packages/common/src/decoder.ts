import { malformedEnvelope, malformedPayload, zodIssuesToValidationIssues, type DecodeError } from "./errors";
import { parseDocument, type RawPayload } from "./payload";
import { GpsMessageSchema, type GpsMessageWire } from "./schema";
import type { TelemetryRecord } from "./telemetry";

export type DecodeResult =
    | { ok: true; value: TelemetryRecord }
    | { ok: false; error: DecodeError };

function toRecord(m: GpsMessageWire): TelemetryRecord {
    return {
        messageVer: m.message_ver,
        messageType: m.message_type,
        gateway: m.gateway,
        port: m.port,
        transmission: m.transmission,
        timestamp: m.timestamp,
        source: m.source,
        seqNo: m.seq_no,
        valid: m.valid,
        activity: m.activity,

        device: {
            identifier: m.device.identifier,
            imei: m.device.imei,
            serialNo: m.device.serial_no,
            firmVer: m.device.firm_ver,
            type: m.device.type,
            model: m.device.model
        },
        network: m.network && {
            remoteIpv4: m.network.remote_ipv4,
            remoteIpv6: m.network.remote_ipv6,
            remotePort: m.network.remote_port,
            mac: m.network.mac
        },
        gsm: m.gsm.map(g => ({
            cid: g.cid,
            lcid: g.lcid,
            lac: g.lac,
            carrier: g.carrier,
            rssi: g.rssi,
            mcc: g.mcc,
            mnc: g.mnc,
            rcpi: g.rcpi,
            ssValue: g.ss_value,
            signalStr: g.signal_str,
            dataMode: g.data_mode,
            status: g.status
        })),
        sims: m.sims.map(s => ({ msisdn: s.msisdn, iccid: s.iccid, imsi: s.imsi })),
        gps: {
            timestamp: m.gps.timestamp,
            latitude: m.gps.latitude,
            longitude: m.gps.longitude,
            altitude: m.gps.altitude,
            speed: m.gps.speed,
            heading: m.gps.heading,
            satellites: m.gps.satellites,
            activity: m.gps.activity,
            odometer: m.gps.odometer,
            tripOdo: m.gps.trip_odo,
            gnss: m.gps.gnss,
            hdop: m.gps.hdop,
            vdop: m.gps.vdop,
            pdop: m.gps.pdop,
            tdop: m.gps.tdop,
            fix: m.gps.fix
        },

        events: m.events,
        sensors: m.sensors,

        inputs: m.inputs,
        outputs: m.outputs,
        auxInputs: m.aux_inputs,
        anInputs: m.an_inputs,

        obdII: m.obd_ii && { mode01: m.obd_ii.mode_01 },
        canBus: m.can_bus
    };
}

/**
 * Decode an already parsed JSON document as a `gps` v1 message.
 *
 * Does not look at `message_type`/`valid` beyond their shape; run the
 * classifier first.
 */
export function decodeDocument(doc: unknown): DecodeResult {
    const res = GpsMessageSchema.safeParse(doc);
    if (!res.success) {
        return { ok: false, error: malformedPayload(zodIssuesToValidationIssues(res.error.issues)) };
    }
    return { ok: true, value: toRecord(res.data) };
}

export function decode(payload: RawPayload): DecodeResult {
    const parsed = parseDocument(payload);
    if (!parsed.ok) {
        return { ok: false, error: malformedEnvelope(parsed.message) };
    }
    return decodeDocument(parsed.value);
}
