import { vi } from 'vitest';

import type { ExecuteError } from '../../src/cloudhome/errors.js';
import { SessionUnavailableError } from '../../src/cloudhome/errors.js';
import type { PushConnection, PushConnectionEvents, PushConnectionFactory } from '../../src/cloudhome/mqtt-connection.js';
import type { DeviceProtocol } from '../../src/cloudhome/protocol-client.js';
import type { MessageHandler, PushTransport } from '../../src/cloudhome/transport-session.js';
import type {
	Command,
	CredentialProvider,
	Device,
	HomeLogger,
	SessionCredential,
	StateSnapshot,
} from '../../src/cloudhome/types.js';

export function makeLogger(): HomeLogger {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

const INFO = { manufacturer: 'Acme', model: 'Test' };

export function makeLight(id = 'light-1', capabilities: Array<'on_off' | 'brightness' | 'color_temperature'> = ['on_off', 'brightness']): Device {
	return { id, name: `Light ${id}`, info: INFO, reportsState: true, deviceClass: 'light', capabilities };
}

export function makeFan(id = 'fan-2'): Device {
	return { id, name: `Fan ${id}`, info: INFO, reportsState: true, deviceClass: 'fan', capabilities: ['on_off', 'speed_percent'] };
}

export function makeSwitch(id = 'switch-3'): Device {
	return { id, name: `Switch ${id}`, info: INFO, reportsState: true, deviceClass: 'switch', capabilities: ['on_off'] };
}

export function makeScene(id = 'scene-4'): Device {
	return { id, name: `Scene ${id}`, info: INFO, reportsState: false, deviceClass: 'scene', capabilities: ['activatable'] };
}

interface PendingExecute {
	command: Command;
	resolve: (snapshot: StateSnapshot) => void;
	reject: (err: Error) => void;
}

/**
 * In-process protocol. EXECUTE calls stay pending until the test settles
 * them, so ordering can be asserted.
 */
export class FakeProtocol implements DeviceProtocol {
	public devices: Device[] = [];
	public states = new Map<string, StateSnapshot>();
	public readonly executes: PendingExecute[] = [];
	public readonly queries: string[][] = [];
	public discoverCalls = 0;
	/** Thrown by discover() while set. */
	public discoverError: Error | null = null;
	/** discover() waits on this while set. */
	public discoverGate: Promise<void> | null = null;

	public async discover(): Promise<Device[]> {
		this.discoverCalls++;
		if (this.discoverGate) {
			await this.discoverGate;
		}
		if (this.discoverError) {
			throw this.discoverError;
		}
		return this.devices;
	}

	public async query(deviceIds: readonly string[]): Promise<Map<string, StateSnapshot>> {
		this.queries.push([...deviceIds]);
		const result = new Map<string, StateSnapshot>();
		for (const id of deviceIds) {
			const state = this.states.get(id);
			if (state) {
				result.set(id, state);
			}
		}
		return result;
	}

	public execute(command: Command): Promise<StateSnapshot> {
		return new Promise<StateSnapshot>((resolve, reject) => {
			this.executes.push({ command, resolve, reject });
		});
	}

	/** Settle the oldest pending EXECUTE with the given state. */
	public confirmNext(snapshot: StateSnapshot): Command {
		const pending = this.executes.shift();
		if (!pending) {
			throw new Error('no EXECUTE pending');
		}
		pending.resolve(snapshot);
		return pending.command;
	}

	public failNext(err: ExecuteError): Command {
		const pending = this.executes.shift();
		if (!pending) {
			throw new Error('no EXECUTE pending');
		}
		pending.reject(err);
		return pending.command;
	}
}

type Listener<T extends unknown[]> = (...args: T) => void;

/** Push transport whose connection state the test drives directly. */
export class FakeTransport implements PushTransport {
	public readonly handlers = new Map<string, MessageHandler>();
	public readonly unsubscribed: string[] = [];
	public connected = false;
	public startCalls = 0;
	public disconnectCalls = 0;
	private readonly disconnectedListeners: Listener<[]>[] = [];
	private readonly reconnectedListeners: Listener<[]>[] = [];
	private readonly unavailableListeners: Listener<[SessionUnavailableError]>[] = [];

	public async start(): Promise<void> {
		this.startCalls++;
		this.connected = true;
	}

	public async subscribe(topicPattern: string, handler: MessageHandler): Promise<void> {
		this.handlers.set(topicPattern, handler);
	}

	public async unsubscribe(topicPattern: string): Promise<void> {
		this.handlers.delete(topicPattern);
		this.unsubscribed.push(topicPattern);
	}

	public async publish(): Promise<void> {
		// not used by the engine
	}

	public async disconnect(): Promise<void> {
		this.disconnectCalls++;
		this.connected = false;
	}

	public isConnected(): boolean {
		return this.connected;
	}

	public onDisconnected(listener: () => void): () => void {
		this.disconnectedListeners.push(listener);
		return () => undefined;
	}

	public onReconnected(listener: () => void): () => void {
		this.reconnectedListeners.push(listener);
		return () => undefined;
	}

	public onUnavailable(listener: (err: SessionUnavailableError) => void): () => void {
		this.unavailableListeners.push(listener);
		return () => undefined;
	}

	public deliver(topic: string, payload: Record<string, unknown>): void {
		const handler = this.handlers.get(topic);
		if (!handler) {
			throw new Error(`no handler for ${topic}`);
		}
		handler(topic, Buffer.from(JSON.stringify(payload)));
	}

	public drop(): void {
		this.connected = false;
		this.disconnectedListeners.forEach((listener) => listener());
	}

	public restore(): void {
		this.connected = true;
		this.reconnectedListeners.forEach((listener) => listener());
	}

	public fail(message: string): void {
		const err = new SessionUnavailableError(message);
		this.unavailableListeners.forEach((listener) => listener(err));
	}
}

export class FakeCredentials implements CredentialProvider {
	public currentCalls = 0;
	public refreshCalls = 0;
	public next: SessionCredential = { accessToken: 'test-token-1', expiresAt: Date.now() + 3_600_000 };
	public refreshError: Error | null = null;

	public async current(): Promise<SessionCredential> {
		this.currentCalls++;
		return this.next;
	}

	public async refresh(): Promise<SessionCredential> {
		this.refreshCalls++;
		if (this.refreshError) {
			throw this.refreshError;
		}
		this.next = { accessToken: `test-token-${this.refreshCalls + 1}`, expiresAt: Date.now() + 3_600_000 };
		return this.next;
	}
}

export interface FakeConnection extends PushConnection {
	credential: SessionCredential;
	events: PushConnectionEvents;
	subscribed: string[];
	unsubscribed: string[];
	/** Rejects the next subscribe when set. */
	subscribeError: Error | null;
	ended: boolean;
}

/** Records every connection the session opens; the test fires its events. */
export class FakeConnectionFactory {
	public readonly connections: FakeConnection[] = [];

	public readonly create: PushConnectionFactory = (credential, events) => {
		const connection: FakeConnection = {
			credential,
			events,
			subscribed: [],
			unsubscribed: [],
			subscribeError: null,
			ended: false,
			subscribe: async (topic) => {
				const err = connection.subscribeError;
				if (err) {
					connection.subscribeError = null;
					throw err;
				}
				connection.subscribed.push(topic);
			},
			unsubscribe: async (topic) => {
				connection.unsubscribed.push(topic);
			},
			publish: async () => undefined,
			end: async () => {
				connection.ended = true;
			},
		};
		this.connections.push(connection);
		return connection;
	};

	public latest(): FakeConnection {
		const connection = this.connections[this.connections.length - 1];
		if (!connection) {
			throw new Error('no connection opened');
		}
		return connection;
	}
}
