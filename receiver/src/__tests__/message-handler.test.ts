import { describe, it, expect, jest } from "@jest/globals";
import * as fs from "fs";
import * as path from "path";
import type { TelemetryRecord } from "@gps-json/common";

import { createLogger } from "../lib/log";
import { createGpsMessageHandler } from "../message-handler";

const sample = fs.readFileSync(path.join(__dirname, "fixtures", "gps-message.json"));
const logger = createLogger({ serviceName: "test", console: false });

describe("createGpsMessageHandler", () => {
	it("hands decoded records to the callback", () => {
		const onRecord = jest.fn<(record: TelemetryRecord) => void>();
		const handle = createGpsMessageHandler({ logger, onRecord });

		const res = handle(sample);

		expect(res.status).toBe("decoded");
		expect(onRecord).toHaveBeenCalledTimes(1);
		expect(onRecord.mock.calls[0][0].device.imei).toBe("350000000000002");
	});

	it.each([
		["ignored", JSON.stringify({ message_ver: 1, message_type: "status", valid: true })],
		["malformed_envelope", "\u0000garbage"],
		["malformed_payload", JSON.stringify({ message_ver: 1, message_type: "gps", valid: true, device: {} })]
	])("reports %s without calling back", (status, payload) => {
		const onRecord = jest.fn<(record: TelemetryRecord) => void>();
		const handle = createGpsMessageHandler({ logger, onRecord });

		expect(handle(payload).status).toBe(status);
		expect(onRecord).not.toHaveBeenCalled();
	});

	it("lets callback failures propagate", () => {
		const handle = createGpsMessageHandler({
			logger,
			onRecord: () => {
				throw new Error("sink unavailable");
			}
		});

		expect(() => handle(sample)).toThrow("sink unavailable");
	});
});
