// src/cloudhome/transport-session.ts
//
// One logical push connection per account. Owns reconnects (exponential
// backoff), credential refresh on rejection, and re-subscription.

import { v4 as uuidv4 } from 'uuid';

import { ListenerSet } from './listener-set.js';
import type { PushConnection, PushConnectionFactory } from './mqtt-connection.js';
import { AuthError, ConnectError, SessionUnavailableError, describeError } from './errors.js';
import { createConsoleLogger } from './types.js';
import type { CredentialProvider, HomeLogger, SessionCredential } from './types.js';

export const DEFAULT_BACKOFF_INITIAL_MS = 1_000;
export const DEFAULT_BACKOFF_MAX_MS = 60_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 30_000;

export interface SessionHandle {
	sessionId: string;
	connectedAt: number;
}

export type MessageHandler = (topic: string, payload: Buffer) => void;

/** The part of the session the sync engine depends on. */
export interface PushTransport {
	start(): Promise<void>;
	subscribe(topicPattern: string, handler: MessageHandler): Promise<void>;
	unsubscribe(topicPattern: string): Promise<void>;
	publish(topic: string, payload: string): Promise<void>;
	disconnect(): Promise<void>;
	isConnected(): boolean;
	onDisconnected(listener: () => void): () => void;
	onReconnected(listener: () => void): () => void;
	onUnavailable(listener: (err: SessionUnavailableError) => void): () => void;
}

export interface TransportSessionOptions {
	credentials: CredentialProvider;
	connectionFactory: PushConnectionFactory;
	backoffInitialMs?: number;
	backoffMaxMs?: number;
	connectTimeoutMs?: number;
	now?: () => number;
	logger?: HomeLogger;
}

/** MQTT topic filter match with + and # wildcards. */
export function topicMatches(pattern: string, topic: string): boolean {
	const p = pattern.split('/');
	const t = topic.split('/');

	for (let i = 0; i < p.length; i++) {
		if (p[i] === '#') {
			return true;
		}
		if (i >= t.length) {
			return false;
		}
		if (p[i] !== '+' && p[i] !== t[i]) {
			return false;
		}
	}
	return p.length === t.length;
}

export class TransportSession implements PushTransport {
	private readonly log: HomeLogger;
	private readonly now: () => number;
	private readonly backoffInitialMs: number;
	private readonly backoffMaxMs: number;
	private readonly connectTimeoutMs: number;

	private readonly subscriptions = new Map<string, MessageHandler[]>();
	private readonly disconnected: ListenerSet<[]>;
	private readonly reconnected: ListenerSet<[]>;
	private readonly unavailable: ListenerSet<[SessionUnavailableError]>;

	private connection: PushConnection | null = null;
	private handle: SessionHandle | null = null;
	// Bumped for every connection; events from older ones are ignored.
	private generation = 0;
	private attempts = 0;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private lastErrorKind: ConnectError['kind'] | null = null;
	private everConnected = false;
	private closed = false;
	private failed = false;

	public constructor(private readonly options: TransportSessionOptions) {
		this.log = options.logger ?? createConsoleLogger('cloudhome-session');
		this.now = options.now ?? Date.now;
		this.backoffInitialMs = options.backoffInitialMs ?? DEFAULT_BACKOFF_INITIAL_MS;
		this.backoffMaxMs = options.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS;
		this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
		this.disconnected = new ListenerSet<[]>(this.log, 'disconnected');
		this.reconnected = new ListenerSet<[]>(this.log, 'reconnected');
		this.unavailable = new ListenerSet<[SessionUnavailableError]>(this.log, 'unavailable');
	}

	public isConnected(): boolean {
		return this.handle !== null;
	}

	public get currentHandle(): SessionHandle | null {
		return this.handle;
	}

	public onDisconnected(listener: () => void): () => void {
		return this.disconnected.add(listener);
	}

	public onReconnected(listener: () => void): () => void {
		return this.reconnected.add(listener);
	}

	public onUnavailable(listener: (err: SessionUnavailableError) => void): () => void {
		return this.unavailable.add(listener);
	}

	/**
	 * Connect with the provider's current credential. A failed first attempt
	 * falls into the reconnect loop rather than rejecting; only an AuthError
	 * ends the session. Does nothing once the session has been disconnected.
	 */
	public async start(): Promise<void> {
		await this.attempt(false);
	}

	/**
	 * Open a connection with the given credential, replacing any existing one.
	 * Resolves once the broker has acknowledged it and every registered topic
	 * has been subscribed again.
	 */
	public connect(credential: SessionCredential): Promise<SessionHandle> {
		if (this.closed) {
			return Promise.reject(new ConnectError('network', 'session is closed'));
		}

		this.dropConnection();
		const generation = ++this.generation;

		return new Promise<SessionHandle>((resolve, reject) => {
			let settled = false;
			let established = false;
			let connection: PushConnection | null = null;

			const fail = (err: ConnectError): void => {
				if (settled) {
					return;
				}
				settled = true;
				clearTimeout(timer);
				if (connection) {
					void connection.end();
				}
				if (this.generation === generation) {
					this.connection = null;
				}
				reject(err);
			};

			const timer = setTimeout(() => {
				fail(new ConnectError('network', `no acknowledgement within ${this.connectTimeoutMs} ms`));
			}, this.connectTimeoutMs);

			connection = this.options.connectionFactory(credential, {
				onConnect: () => {
					if (settled || generation !== this.generation || !connection) {
						return;
					}
					settled = true;
					established = true;
					clearTimeout(timer);

					const handle: SessionHandle = { sessionId: uuidv4(), connectedAt: this.now() };
					this.handle = handle;
					this.lastErrorKind = null;
					void this.resubscribeAll(connection).then(() => resolve(handle));
				},
				onMessage: (topic, payload) => {
					if (generation !== this.generation) {
						return;
					}
					this.dispatch(topic, payload);
				},
				onError: (err) => {
					if (generation !== this.generation) {
						return;
					}
					if (!settled) {
						fail(err);
						return;
					}
					this.lastErrorKind = err.kind;
					this.log.warn('Push session error: %s', err.message);
				},
				onClose: () => {
					if (generation !== this.generation) {
						return;
					}
					if (!settled) {
						fail(new ConnectError('network', 'connection closed before it was acknowledged'));
						return;
					}
					if (established) {
						this.handleUnexpectedClose();
					}
				},
			});

			if (settled) {
				void connection.end();
			} else {
				this.connection = connection;
			}
		});
	}

	/**
	 * Register a handler. The topic is subscribed now when connected and again
	 * after every reconnect. If the broker refuses the subscription the handler
	 * is not registered.
	 */
	public async subscribe(topicPattern: string, handler: MessageHandler): Promise<void> {
		const existing = this.subscriptions.get(topicPattern);
		if (existing) {
			if (!existing.includes(handler)) {
				existing.push(handler);
			}
			return;
		}

		if (this.connection && this.handle) {
			await this.connection.subscribe(topicPattern);
		}
		const handlers = this.subscriptions.get(topicPattern);
		if (handlers) {
			handlers.push(handler);
		} else {
			this.subscriptions.set(topicPattern, [handler]);
		}
	}

	/** Drop every handler for the pattern; it is not subscribed again on reconnect. */
	public async unsubscribe(topicPattern: string): Promise<void> {
		if (!this.subscriptions.delete(topicPattern)) {
			return;
		}
		if (this.connection && this.handle) {
			await this.connection.unsubscribe(topicPattern);
		}
	}

	public async publish(topic: string, payload: string): Promise<void> {
		if (!this.connection || !this.handle) {
			throw new ConnectError('network', `cannot publish to ${topic}: not connected`);
		}
		await this.connection.publish(topic, payload);
	}

	public async disconnect(): Promise<void> {
		this.closed = true;
		this.clearReconnectTimer();
		this.generation++;
		const connection = this.connection;
		this.connection = null;
		this.handle = null;
		if (connection) {
			await connection.end();
		}
		this.log.debug('Push session disconnected.');
	}

	private async attempt(forceRefresh: boolean): Promise<void> {
		if (this.closed) {
			return;
		}

		let credential: SessionCredential;
		try {
			credential = forceRefresh
				? await this.options.credentials.refresh()
				: await this.options.credentials.current();
		} catch (err) {
			if (err instanceof AuthError) {
				this.failPermanently(err);
				return;
			}
			this.log.warn('Push session: could not obtain a credential: %s', describeError(err));
			this.scheduleReconnect(forceRefresh);
			return;
		}

		if (this.closed) {
			return;
		}

		try {
			const handle = await this.connect(credential);
			const isReconnect = this.everConnected;
			this.everConnected = true;
			this.attempts = 0;
			this.log.info('Push session %s connected.', handle.sessionId);
			if (isReconnect) {
				this.reconnected.emit();
			}
		} catch (err) {
			if (this.closed) {
				return;
			}
			if (err instanceof ConnectError) {
				if (err.kind === 'protocol-negotiation-failed') {
					this.log.error('Push session: %s', err.message);
				} else {
					this.log.warn('Push session: connect failed (%s): %s', err.kind, err.message);
				}
				this.scheduleReconnect(err.kind === 'credential-expired');
				return;
			}
			this.log.error('Push session: unexpected connect failure: %s', describeError(err));
			this.scheduleReconnect(false);
		}
	}

	private handleUnexpectedClose(): void {
		this.connection = null;
		this.handle = null;
		if (this.closed) {
			return;
		}

		this.log.warn('Push session dropped; reconnecting.');
		this.disconnected.emit();
		this.scheduleReconnect(this.lastErrorKind === 'credential-expired');
	}

	private nextDelay(): number {
		const delay = Math.min(this.backoffInitialMs * 2 ** this.attempts, this.backoffMaxMs);
		this.attempts++;
		return delay;
	}

	private scheduleReconnect(refreshCredential: boolean): void {
		if (this.closed || this.reconnectTimer) {
			return;
		}

		const delay = this.nextDelay();
		this.log.info('Push session: reconnect attempt %d in %d ms.', this.attempts, delay);
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.attempt(refreshCredential).catch((err: unknown) => {
				this.log.error('Push session: reconnect attempt failed: %s', describeError(err));
			});
		}, delay);
	}

	private clearReconnectTimer(): void {
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
	}

	private failPermanently(cause: AuthError): void {
		if (this.failed) {
			return;
		}
		this.failed = true;
		this.closed = true;
		this.clearReconnectTimer();

		const err = new SessionUnavailableError('reauthentication required', { cause });
		this.log.error('Push session unavailable: %s (%s)', err.message, cause.message);
		this.unavailable.emit(err);
	}

	private dropConnection(): void {
		const previous = this.connection;
		this.connection = null;
		this.handle = null;
		if (previous) {
			void previous.end();
		}
	}

	private async resubscribeAll(connection: PushConnection): Promise<void> {
		for (const topic of this.subscriptions.keys()) {
			try {
				await connection.subscribe(topic);
			} catch (err) {
				this.log.warn('Push session: failed to subscribe to %s: %s', topic, describeError(err));
			}
		}
	}

	private dispatch(topic: string, payload: Buffer): void {
		for (const [pattern, handlers] of this.subscriptions) {
			if (!topicMatches(pattern, topic)) {
				continue;
			}
			for (const handler of handlers) {
				try {
					handler(topic, payload);
				} catch (err) {
					this.log.error('Push handler for %s threw: %s', pattern, describeError(err));
				}
			}
		}
	}
}
