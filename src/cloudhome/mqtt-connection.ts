// src/cloudhome/mqtt-connection.ts
//
// Thin adapter over the mqtt package. Reconnects are driven by the
// TransportSession, so the client's own reconnect loop is disabled.

import { connect } from 'mqtt';
import type { IClientOptions } from 'mqtt';

import { ConnectError, describeError } from './errors.js';
import { createConsoleLogger } from './types.js';
import type { HomeLogger, SessionCredential } from './types.js';

export interface PushConnectionEvents {
	onConnect(): void;
	onMessage(topic: string, payload: Buffer): void;
	onError(err: ConnectError): void;
	onClose(): void;
}

export interface PushConnection {
	subscribe(topic: string): Promise<void>;
	unsubscribe(topic: string): Promise<void>;
	publish(topic: string, payload: string): Promise<void>;
	end(): Promise<void>;
}

export type PushConnectionFactory = (credential: SessionCredential, events: PushConnectionEvents) => PushConnection;

export interface MqttConnectionOptions {
	host: string;
	port: number;
	/** Account identifier; first segment of the authorizer username. */
	username: string;
	clientId: string;
	authorizerName: string;
	connectTimeoutMs?: number;
	keepaliveSeconds?: number;
}

// CONNACK return codes (3.1.1) and reason codes (5) for rejected credentials.
const CREDENTIAL_REJECTED_CODES = new Set([4, 5, 134, 135]);

/**
 * The broker's custom authorizer reads the bearer token from the username's
 * query string.
 */
export function buildAuthorizerUsername(
	username: string,
	clientId: string,
	authorizerName: string,
	accessToken: string,
): string {
	const authorizer = encodeURIComponent(authorizerName);
	const token = encodeURIComponent(`Bearer ${accessToken}`);
	return `${username}/${clientId}?x-amz-customauthorizer-name=${authorizer}&token=${token}`;
}

export function classifyConnectError(err: Error): ConnectError {
	const code = 'code' in err ? err.code : undefined;

	if (typeof code === 'number' && CREDENTIAL_REJECTED_CODES.has(code)) {
		return new ConnectError('credential-expired', `broker rejected the credential (code ${code})`, { cause: err });
	}

	const text = `${typeof code === 'string' ? code : ''} ${err.message}`.toLowerCase();
	if (text.includes('alpn') || text.includes('application_protocol') || text.includes('err_ssl')) {
		return new ConnectError('protocol-negotiation-failed', `TLS negotiation failed: ${err.message}`, { cause: err });
	}

	return new ConnectError('network', err.message, { cause: err });
}

export function createMqttConnectionFactory(
	options: MqttConnectionOptions,
	logger?: HomeLogger,
): PushConnectionFactory {
	const log = logger ?? createConsoleLogger('cloudhome-mqtt');

	return (credential, events) => {
		const clientOptions: IClientOptions = {
			host: options.host,
			port: options.port,
			protocol: 'mqtts',
			protocolVersion: 4,
			clientId: options.clientId,
			username: buildAuthorizerUsername(
				options.username,
				options.clientId,
				options.authorizerName,
				credential.accessToken,
			),
			ALPNProtocols: ['mqtt'],
			rejectUnauthorized: true,
			clean: true,
			keepalive: options.keepaliveSeconds ?? 60,
			connectTimeout: options.connectTimeoutMs ?? 30_000,
			reconnectPeriod: 0,
		};

		log.debug('MQTT: connecting to %s:%d as client %s', options.host, options.port, options.clientId);
		const client = connect(clientOptions);

		client.on('connect', () => events.onConnect());
		client.on('message', (topic, payload) => events.onMessage(topic, payload));
		client.on('error', (err) => events.onError(classifyConnectError(err)));
		client.on('close', () => events.onClose());

		return {
			subscribe: async (topic) => {
				await client.subscribeAsync(topic, { qos: 1 });
			},
			unsubscribe: async (topic) => {
				await client.unsubscribeAsync(topic);
			},
			publish: async (topic, payload) => {
				await client.publishAsync(topic, payload, { qos: 1 });
			},
			end: async () => {
				try {
					await client.endAsync();
				} catch (err) {
					log.debug('MQTT: error while closing connection: %s', describeError(err));
				}
			},
		};
	};
}
