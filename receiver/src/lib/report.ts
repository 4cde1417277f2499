import { formatFieldValue, type TelemetryRecord } from "@gps-json/common";

const RULE = "=".repeat(78);
const LABEL_WIDTH = 16;

function line(label: string, value: string): string {
	return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

function show(v: string | number | boolean | null | undefined): string {
	return v === null || v === undefined ? "-" : String(v);
}

function list(values: Iterable<string>): string {
	const joined = [...values].join(", ");
	return joined === "" ? "-" : joined;
}

/** `yyyy-MM-dd HH:mm:ss` in UTC. */
export function formatUtc(d: Date): string {
	return d.toISOString().slice(0, 19).replace("T", " ");
}

/**
 * Console report for one decoded message. Only the first GSM and SIM entries
 * are shown.
 */
export function formatGpsReport(r: TelemetryRecord): string[] {
	const gsm = r.gsm[0];
	const sim = r.sims[0];
	const gps = r.gps;

	const out: string[] = [
		RULE,
		line("imei", show(r.device.imei)),
		line("message_type", r.messageType),
		line("gateway", show(r.gateway)),
		line("port", show(r.port)),
		line("transmission", show(r.transmission)),

		line("gsm.signal_str", show(gsm?.signalStr)),
		line("gsm.status", gsm ? list(gsm.status) : "-"),

		line("sims.msisdn", show(sim?.msisdn)),
		line("sims.iccid", show(sim?.iccid)),

		line("gps.timestamp", gps.timestamp ? formatUtc(gps.timestamp) : "no time sync"),
		line("gps.latitude", show(gps.latitude)),
		line("gps.longitude", show(gps.longitude)),
		line("gps.altitude", show(gps.altitude)),
		line("gps.speed", show(gps.speed)),
		line("gps.heading", show(gps.heading)),
		line("gps.satellites", show(gps.satellites)),
		line("gps.activity", show(gps.activity)),
		line("gps.odometer", show(gps.odometer)),
		line("gps.trip_odo", show(gps.tripOdo)),
		line("gps.fix", list(gps.fix)),
		line(
			"gps.dop",
			`hdop: ${show(gps.hdop)} vdop: ${show(gps.vdop)} pdop: ${show(gps.pdop)} tdop: ${show(gps.tdop)}`
		)
	];

	for (const ev of r.events) {
		out.push(line("event", ev.code));
		for (const f of ev.fields) {
			out.push(`${"field:".padStart(LABEL_WIDTH - 1)} ${f.key}=${formatFieldValue(f.value)}`);
		}
	}

	for (const s of r.sensors) {
		out.push(line("sensor", `${s.name} = ${formatFieldValue(s.value)}`));
	}

	for (const p of r.obdII?.mode01 ?? []) {
		out.push(line("OBD PID", `${p.pid} = ${p.value}`));
	}

	for (const c of r.canBus) {
		out.push(line("CAN bus", `${c.id} = ${c.value}`));
	}

	out.push(RULE);
	return out;
}
