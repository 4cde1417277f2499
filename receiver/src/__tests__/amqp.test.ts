import { describe, it, expect, beforeEach } from "@jest/globals";

import { GpsQueueConsumer, type BrokerChannel, type BrokerConnection, type DeliveredMessage } from "../lib/amqp";
import type { BrokerConfig, QueueConfig } from "../lib/config";
import { AppError } from "../lib/errors";
import { createLogger } from "../lib/log";

const broker: BrokerConfig = {
	hostname: "rabbit.local",
	port: 5672,
	username: "receiver",
	password: "test-secret",
	vhost: "/"
};

const queue: QueueConfig = {
	name: "gps.receiver.test",
	exchange: "acm.gws",
	routingKey: "gps.#",
	durable: true,
	exclusive: false,
	autoDelete: false,
	prefetch: 5
};

const logger = createLogger({ serviceName: "test", console: false });

/** Records every call the consumer makes and lets the test push deliveries. */
class FakeChannel implements BrokerChannel {
	calls: string[] = [];
	acked: number[] = [];
	nacked: { tag: number; requeue: boolean | undefined }[] = [];
	private onMessage: ((msg: DeliveredMessage | null) => void) | null = null;

	async assertQueue(name: string, options: { durable: boolean; exclusive: boolean; autoDelete: boolean }): Promise<unknown> {
		this.calls.push(`assertQueue ${name} durable=${options.durable} exclusive=${options.exclusive} autoDelete=${options.autoDelete}`);
		return {};
	}

	async bindQueue(name: string, source: string, pattern: string): Promise<unknown> {
		this.calls.push(`bindQueue ${name} ${source} ${pattern}`);
		return {};
	}

	async prefetch(count: number): Promise<unknown> {
		this.calls.push(`prefetch ${count}`);
		return {};
	}

	async consume(
		name: string,
		onMessage: (msg: DeliveredMessage | null) => void,
		options: { noAck: boolean }
	): Promise<{ consumerTag: string }> {
		this.calls.push(`consume ${name} noAck=${options.noAck}`);
		this.onMessage = onMessage;
		return { consumerTag: "ctag-1" };
	}

	async cancel(consumerTag: string): Promise<unknown> {
		this.calls.push(`cancel ${consumerTag}`);
		return {};
	}

	ack(message: DeliveredMessage): void {
		this.acked.push(message.fields.deliveryTag);
	}

	nack(message: DeliveredMessage, _allUpTo?: boolean, requeue?: boolean): void {
		this.nacked.push({ tag: message.fields.deliveryTag, requeue });
	}

	async close(): Promise<void> {
		this.calls.push("close");
	}

	deliver(deliveryTag: number, body: string, redelivered = false): void {
		if (!this.onMessage) throw new Error("not consuming");
		this.onMessage({
			content: Buffer.from(body),
			fields: { deliveryTag, redelivered, routingKey: "gps.350000000000002" }
		});
	}

	cancelFromServer(): void {
		this.onMessage?.(null);
	}
}

class FakeConnection implements BrokerConnection {
	closed = false;
	errorListeners: ((err: Error) => void)[] = [];

	constructor(readonly channel: FakeChannel) {}

	async createChannel(): Promise<BrokerChannel> {
		return this.channel;
	}

	on(_event: "error", listener: (err: Error) => void): unknown {
		this.errorListeners.push(listener);
		return this;
	}

	async close(): Promise<void> {
		this.closed = true;
	}
}

describe("GpsQueueConsumer", () => {
	let channel: FakeChannel;
	let connection: FakeConnection;
	let handled: string[];

	beforeEach(() => {
		channel = new FakeChannel();
		connection = new FakeConnection(channel);
		handled = [];
	});

	function consumer(handle: (content: Buffer) => unknown = content => handled.push(content.toString("utf8"))) {
		return new GpsQueueConsumer({
			broker,
			queue,
			logger,
			handle,
			connect: async () => connection
		});
	}

	it("declares, binds and consumes with manual acknowledgement", async () => {
		await consumer().start();

		expect(channel.calls).toEqual([
			"assertQueue gps.receiver.test durable=true exclusive=false autoDelete=false",
			"bindQueue gps.receiver.test acm.gws gps.#",
			"prefetch 5",
			"consume gps.receiver.test noAck=false"
		]);
		expect(connection.errorListeners).toHaveLength(1);
	});

	it("acks each delivery after handling it", async () => {
		await consumer().start();

		channel.deliver(1, '{"message_ver":1}');
		channel.deliver(2, "not json");

		expect(handled).toEqual(['{"message_ver":1}', "not json"]);
		expect(channel.acked).toEqual([1, 2]);
		expect(channel.nacked).toEqual([]);
	});

	it("requeues a failed delivery once, then drops it", async () => {
		await consumer(() => {
			throw new Error("boom");
		}).start();

		channel.deliver(7, "{}");
		channel.deliver(8, "{}", true);

		expect(channel.acked).toEqual([]);
		expect(channel.nacked).toEqual([
			{ tag: 7, requeue: true },
			{ tag: 8, requeue: false }
		]);
	});

	it("survives a server-side cancel", async () => {
		await consumer().start();
		channel.cancelFromServer();
		expect(channel.acked).toEqual([]);
	});

	it("cancels the consumer and closes channel and connection on stop", async () => {
		const c = consumer();
		await c.start();
		await c.stop();

		expect(channel.calls.slice(-2)).toEqual(["cancel ctag-1", "close"]);
		expect(connection.closed).toBe(true);

		// Stopping twice is harmless.
		await c.stop();
		expect(channel.calls.filter(call => call === "close")).toHaveLength(1);
	});

	it("wraps connection failures in a broker error", async () => {
		const c = new GpsQueueConsumer({
			broker,
			queue,
			logger,
			handle: () => undefined,
			connect: async () => {
				throw new Error("ECONNREFUSED");
			}
		});

		const err = await c.start().catch((e: unknown) => e);
		expect(err).toBeInstanceOf(AppError);
		if (err instanceof AppError) {
			expect(err.code).toBe("BROKER_ERROR");
			expect(err.message).toBe("Unable to connect to rabbit.local:5672: ECONNREFUSED");
		}
	});

	it("closes the connection when queue setup fails", async () => {
		channel.bindQueue = async () => {
			throw new Error("NOT_FOUND - no exchange 'acm.gws'");
		};

		const err = await consumer().start().catch((e: unknown) => e);
		expect(err).toBeInstanceOf(AppError);
		if (err instanceof AppError) {
			expect(err.message).toBe("Unable to set up consumer on queue gps.receiver.test: NOT_FOUND - no exchange 'acm.gws'");
		}
		expect(connection.closed).toBe(true);
	});
});
