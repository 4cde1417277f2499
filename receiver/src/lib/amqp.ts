import { connect } from "amqplib";
import type winston from "winston";

import type { BrokerConfig, QueueConfig } from "./config";
import { brokerError } from "./errors";

// The consumer only needs this slice of amqplib's connection and channel,
// which keeps it testable with an in-process fake.

export interface DeliveredMessage {
	content: Buffer;
	fields: {
		deliveryTag: number;
		redelivered: boolean;
		routingKey: string;
	};
}

export interface BrokerChannel {
	assertQueue(queue: string, options: { durable: boolean; exclusive: boolean; autoDelete: boolean }): Promise<unknown>;
	bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
	prefetch(count: number): Promise<unknown>;
	consume(
		queue: string,
		onMessage: (msg: DeliveredMessage | null) => void,
		options: { noAck: boolean }
	): Promise<{ consumerTag: string }>;
	cancel(consumerTag: string): Promise<unknown>;
	ack(message: DeliveredMessage): void;
	nack(message: DeliveredMessage, allUpTo?: boolean, requeue?: boolean): void;
	close(): Promise<void>;
}

export interface BrokerConnection {
	createChannel(): Promise<BrokerChannel>;
	on(event: "error", listener: (err: Error) => void): unknown;
	close(): Promise<void>;
}

export type BrokerConnector = (broker: BrokerConfig) => Promise<BrokerConnection>;

export const connectAmqp: BrokerConnector = async broker =>
	connect({
		protocol: "amqp",
		hostname: broker.hostname,
		port: broker.port,
		username: broker.username,
		password: broker.password,
		vhost: broker.vhost
	});

export interface GpsQueueConsumerOptions {
	broker: BrokerConfig;
	queue: QueueConfig;
	logger: winston.Logger;
	/** Handles one delivery body. Throwing leaves the delivery unacknowledged. */
	handle: (content: Buffer) => unknown;
	connect?: BrokerConnector;
}

/**
 * Declares the queue, binds it to the topic exchange and consumes with manual
 * acknowledgement.
 *
 * Every delivery the handler returns from is acked, whatever the outcome: a
 * malformed message will not get better on redelivery. When the handler
 * throws, the delivery is requeued once; a delivery that fails again after
 * redelivery is dropped.
 */
export class GpsQueueConsumer {
	private connection: BrokerConnection | null = null;
	private channel: BrokerChannel | null = null;
	private consumerTag: string | null = null;

	constructor(private readonly opts: GpsQueueConsumerOptions) {}

	async start(): Promise<void> {
		const { broker, queue, logger } = this.opts;
		const doConnect = this.opts.connect ?? connectAmqp;

		logger.info("Connecting to broker %s:%d (vhost=%s)", broker.hostname, broker.port, broker.vhost);
		try {
			this.connection = await doConnect(broker);
		} catch (err) {
			throw brokerError(`Unable to connect to ${broker.hostname}:${broker.port}`, err);
		}
		this.connection.on("error", err => {
			logger.error("Broker connection error: %s", err.message);
		});

		try {
			const channel = await this.connection.createChannel();
			this.channel = channel;

			logger.info("Declaring queue %s (durable=%s exclusive=%s autoDelete=%s)", queue.name, queue.durable, queue.exclusive, queue.autoDelete);
			await channel.assertQueue(queue.name, {
				durable: queue.durable,
				exclusive: queue.exclusive,
				autoDelete: queue.autoDelete
			});

			logger.info("Binding queue %s to exchange %s (routingKey=%s)", queue.name, queue.exchange, queue.routingKey);
			await channel.bindQueue(queue.name, queue.exchange, queue.routingKey);
			await channel.prefetch(queue.prefetch);

			const { consumerTag } = await channel.consume(queue.name, msg => this.onDelivery(channel, msg), { noAck: false });
			this.consumerTag = consumerTag;
		} catch (err) {
			await this.stop();
			throw brokerError(`Unable to set up consumer on queue ${queue.name}`, err);
		}

		logger.info("Consumer started (queue=%s prefetch=%d)", queue.name, queue.prefetch);
	}

	async stop(): Promise<void> {
		const { logger } = this.opts;
		const channel = this.channel;
		const connection = this.connection;
		const consumerTag = this.consumerTag;

		this.channel = null;
		this.connection = null;
		this.consumerTag = null;

		try {
			if (channel && consumerTag) await channel.cancel(consumerTag);
			if (channel) await channel.close();
		} catch (err) {
			logger.warn("Error while closing channel: %s", err instanceof Error ? err.message : String(err));
		}

		if (connection) {
			await connection.close();
			logger.info("Broker connection closed");
		}
	}

	private onDelivery(channel: BrokerChannel, msg: DeliveredMessage | null): void {
		const { logger, handle } = this.opts;

		if (msg === null) {
			logger.warn("Consumer was cancelled by the broker");
			return;
		}

		logger.debug("Received message (routingKey=%s deliveryTag=%d bytes=%d)", msg.fields.routingKey, msg.fields.deliveryTag, msg.content.length);

		try {
			handle(msg.content);
		} catch (err) {
			const requeue = !msg.fields.redelivered;
			logger.error(
				"Failed to handle message (deliveryTag=%d requeue=%s): %s",
				msg.fields.deliveryTag,
				requeue,
				err instanceof Error ? err.message : String(err)
			);
			channel.nack(msg, false, requeue);
			return;
		}

		channel.ack(msg);
		logger.debug("Acknowledged deliveryTag=%d", msg.fields.deliveryTag);
	}
}
