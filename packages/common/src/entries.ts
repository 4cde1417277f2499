import { z } from "zod";

import type { CanEntry, EventField, ObdPid, SensorReading, TelemetryEvent } from "./telemetry";
import { toFieldValue } from "./values";

// Events, sensors, OBD PIDs and CAN bus data are all encoded as arrays of
// arrays whose first element is the key. The schemas below turn those
// positional shapes into named records.

export const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]).transform(toFieldValue);

/** `["x", -0.4531]` */
export const FieldPairSchema = z.tuple([z.string(), FieldValueSchema]);

/**
 * `["HARSH_DRIVING:BRAKING", ["x", -0.4531], ["y", 0.00312]]`
 *
 * The first element is the event code. Later elements become fields only when
 * they are two-element arrays of a string key and a JSON scalar value. Anything
 * else in those positions is skipped: bare scalars, objects, arrays of another
 * length, a non-string key (`[1, 2]`) or a nested value (`["k", [1, 2]]`).
 */
export const EventEntrySchema = z.array(z.unknown()).transform((items, ctx): TelemetryEvent => {
    const [code, ...rest] = items;
    if (typeof code !== "string") {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [0],
            message: items.length === 0 ? "Event entry is empty" : "Event code must be a string"
        });
        return z.NEVER;
    }

    const fields: EventField[] = [];
    for (const item of rest) {
        const pair = FieldPairSchema.safeParse(item);
        if (pair.success) {
            fields.push({ key: pair.data[0], value: pair.data[1] });
        }
    }

    return { code, fields };
});

/** `["fuel_level", 23.7]` */
export const SensorEntrySchema = FieldPairSchema.transform(([name, value]): SensorReading => ({ name, value }));

/** `[12, 3450]`: PID 0x0C (engine RPM) and its value. */
export const ObdPidSchema = z
    .tuple([z.number().int(), z.number().int()])
    .transform(([pid, value]): ObdPid => ({ pid, value }));

export const CanEntrySchema = z
    .tuple([z.number().int(), z.number().int()])
    .transform(([id, value]): CanEntry => ({ id, value }));
