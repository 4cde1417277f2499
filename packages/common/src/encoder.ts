import type { TelemetryRecord } from "./telemetry";
import { fieldValueToJson, type JsonScalar } from "./values";

type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };

function iso(d: Date | null): string | null {
    return d === null ? null : d.toISOString();
}

/**
 * Back to the wire shape: snake_case keys, `null` for anything absent, lists in
 * decode order. Event elements that were not `[key, value]` pairs were dropped
 * at decode time and do not come back.
 */
export function encodeRecord(r: TelemetryRecord): { [key: string]: JsonValue } {
    return {
        message_ver: r.messageVer,
        message_type: r.messageType,
        gateway: r.gateway,
        port: r.port,
        transmission: r.transmission,
        timestamp: iso(r.timestamp),
        source: r.source,
        seq_no: r.seqNo,
        valid: r.valid,
        activity: r.activity,
        device: {
            identifier: r.device.identifier,
            imei: r.device.imei,
            serial_no: r.device.serialNo,
            firm_ver: r.device.firmVer,
            type: r.device.type,
            model: r.device.model
        },
        network: r.network && {
            remote_ipv4: r.network.remoteIpv4,
            remote_ipv6: r.network.remoteIpv6,
            remote_port: r.network.remotePort,
            mac: r.network.mac
        },
        gsm: r.gsm.map(g => ({
            cid: [...g.cid],
            lcid: [...g.lcid],
            lac: [...g.lac],
            carrier: g.carrier,
            rssi: [...g.rssi],
            mcc: [...g.mcc],
            mnc: [...g.mnc],
            rcpi: [...g.rcpi],
            ss_value: g.ssValue,
            signal_str: g.signalStr,
            data_mode: g.dataMode,
            status: [...g.status]
        })),
        sims: r.sims.map(s => ({ msisdn: s.msisdn, iccid: s.iccid, imsi: s.imsi })),
        gps: {
            timestamp: iso(r.gps.timestamp),
            latitude: r.gps.latitude,
            longitude: r.gps.longitude,
            altitude: r.gps.altitude,
            speed: r.gps.speed,
            heading: r.gps.heading,
            satellites: r.gps.satellites,
            activity: r.gps.activity,
            odometer: r.gps.odometer,
            trip_odo: r.gps.tripOdo,
            gnss: r.gps.gnss,
            hdop: r.gps.hdop,
            vdop: r.gps.vdop,
            pdop: r.gps.pdop,
            tdop: r.gps.tdop,
            fix: [...r.gps.fix]
        },
        events: r.events.map(e => [e.code, ...e.fields.map((f): JsonValue => [f.key, fieldValueToJson(f.value)])]),
        sensors: r.sensors.map(s => [s.name, fieldValueToJson(s.value)]),
        inputs: r.inputs,
        outputs: r.outputs,
        aux_inputs: [...r.auxInputs],
        an_inputs: [...r.anInputs],
        obd_ii: r.obdII && { mode_01: r.obdII.mode01.map(p => [p.pid, p.value]) },
        can_bus: r.canBus.map(c => [c.id, c.value])
    };
}
