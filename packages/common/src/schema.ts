import { z } from "zod";

import { CanEntrySchema, EventEntrySchema, ObdPidSchema, SensorEntrySchema } from "./entries";

/** Missing and `null` both mean "not reported". */
function orNull<T extends z.ZodTypeAny>(schema: T) {
    return schema.nullish().transform((v): z.output<T> | null => v ?? null);
}

/** Missing and `null` lists decode to an empty list. */
function listOf<T extends z.ZodTypeAny>(item: T) {
    return z
        .array(item)
        .nullish()
        .transform((v): z.output<T>[] => v ?? []);
}

/** Flag lists are unordered; duplicates collapse. */
function flagSet() {
    return z
        .array(z.string())
        .nullish()
        .transform((v): ReadonlySet<string> => new Set(v ?? []));
}

// Date parses far more than ISO 8601 and reads zone-less times in the host's
// zone, so the format is checked first. An offset or "Z" is required.
const IsoDateTimeSchema = z.string().datetime({ offset: true });

const IsoTimestampSchema = z.string().transform((s, ctx) => {
    const d = IsoDateTimeSchema.safeParse(s).success ? new Date(s) : null;
    if (d === null || Number.isNaN(d.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ISO 8601 timestamp '${s}'` });
        return z.NEVER;
    }
    return d;
});

const int = () => z.number().int();

/* ---------- envelope ---------- */

// Wrongly typed fields are treated as absent; only a non-object document
// fails this schema.
export const EnvelopeSchema = z.object({
    message_ver: z.number().int().optional().catch(undefined),
    message_type: z.string().optional().catch(undefined),
    valid: z.boolean().optional().catch(undefined)
});

/* ---------- gps message ---------- */

export const DeviceSchema = z.object({
    identifier: orNull(z.string()),
    imei: orNull(z.string()),
    serial_no: orNull(z.string()),
    firm_ver: orNull(z.string()),
    type: orNull(z.string()),
    model: orNull(z.string())
});

export const NetworkSchema = z.object({
    remote_ipv4: orNull(z.string()),
    remote_ipv6: orNull(z.string()),
    remote_port: orNull(int()),
    mac: orNull(z.string())
});

export const GsmSchema = z.object({
    cid: listOf(int()),
    lcid: listOf(int()),
    lac: listOf(int()),
    carrier: orNull(int()),
    rssi: listOf(int()),
    mcc: listOf(z.string()),
    mnc: listOf(z.string()),
    rcpi: listOf(int()),
    ss_value: orNull(int()),
    signal_str: orNull(int()),
    data_mode: orNull(z.string()),
    status: flagSet()
});

export const SimSchema = z.object({
    msisdn: orNull(z.string()),
    iccid: orNull(z.string()),
    imsi: orNull(z.string())
});

export const GpsSchema = z.object({
    timestamp: orNull(IsoTimestampSchema),
    latitude: z.number(),
    longitude: z.number(),
    altitude: z.number(),
    speed: z.number(),
    heading: z.number(),
    satellites: int(),
    activity: orNull(z.string()),
    odometer: orNull(int()),
    trip_odo: orNull(int()),
    gnss: orNull(z.boolean()),
    hdop: orNull(z.number()),
    vdop: orNull(z.number()),
    pdop: orNull(z.number()),
    tdop: orNull(z.number()),
    fix: flagSet()
});

export const ObdIISchema = z.object({
    mode_01: listOf(ObdPidSchema)
});

export const GpsMessageSchema = z.object({
    message_ver: int(),
    message_type: z.string(),
    gateway: orNull(z.string()),
    port: orNull(int()),
    transmission: orNull(z.string()),
    timestamp: orNull(IsoTimestampSchema),
    source: orNull(z.string()),
    seq_no: orNull(int()),
    valid: z.boolean(),
    activity: orNull(z.string()),

    device: DeviceSchema,
    network: orNull(NetworkSchema),
    gsm: z.array(GsmSchema),
    sims: z.array(SimSchema),
    gps: GpsSchema,

    events: listOf(EventEntrySchema),
    sensors: listOf(SensorEntrySchema),

    inputs: orNull(z.string()),
    outputs: orNull(z.string()),
    aux_inputs: listOf(z.string()),
    an_inputs: listOf(z.number()),

    obd_ii: orNull(ObdIISchema),
    can_bus: listOf(CanEntrySchema)
});

export type GpsMessageWire = z.output<typeof GpsMessageSchema>;
