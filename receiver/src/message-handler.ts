import type winston from "winston";
import {
	previewPayload,
	processMessage,
	type ProcessedMessage,
	type RawPayload,
	type TelemetryRecord
} from "@gps-json/common";

export interface GpsMessageHandlerOptions {
	logger: winston.Logger;
	/** Called once per decoded message. Exceptions propagate to the caller. */
	onRecord: (record: TelemetryRecord) => void;
}

export type GpsMessageHandler = (payload: RawPayload) => ProcessedMessage;

/**
 * Classify and decode one delivery, log the outcome and hand decoded records
 * on. Filtered and malformed messages are reported here and never retried.
 */
export function createGpsMessageHandler(opts: GpsMessageHandlerOptions): GpsMessageHandler {
	const { logger, onRecord } = opts;

	return (payload: RawPayload): ProcessedMessage => {
		const result = processMessage(payload);

		switch (result.status) {
			case "decoded":
				logger.debug(
					"Decoded gps message (imei=%s seq_no=%s)",
					result.record.device.imei ?? "-",
					result.record.seqNo ?? "-"
				);
				onRecord(result.record);
				break;

			case "ignored":
				logger.debug(
					"Ignoring message (message_type=%s message_ver=%s valid=%s)",
					result.envelope.messageType ?? "-",
					result.envelope.messageVer ?? "-",
					result.envelope.valid ?? "-"
				);
				break;

			case "malformed_envelope":
				logger.warn("Dropping unparsable message: %s (body=%s)", result.error.message, previewPayload(payload));
				break;

			case "malformed_payload":
				// The message claims to be a valid gps v1 message but does not match the format.
				logger.warn(
					"Dropping gps message that failed validation: %s (issues=%d body=%s)",
					result.error.message,
					result.error.issues.length,
					previewPayload(payload)
				);
				break;
		}

		return result;
	};
}
