// src/cloudhome/protocol-client.ts
//
// SYNC / QUERY / EXECUTE over the account's request/response endpoint.
// Every call carries a fresh requestId and is bounded by a timeout.

import { v4 as uuidv4 } from 'uuid';

import type { FetchLike } from './auth-client.js';
import { deviceFromDescriptor } from './device-catalog.js';
import { ExecuteError, MergeDrop, ProtocolError, describeError } from './errors.js';
import type { CapabilityOutcome } from './errors.js';
import { capabilityForWireKey, decodeWireState, encodeChanges } from './state-codec.js';
import { CAPABILITY_NAMES, createConsoleLogger } from './types.js';
import type {
	CapabilityName,
	Command,
	CredentialProvider,
	Device,
	HomeLogger,
	StateSnapshot,
} from './types.js';
import {
	ExecutePayloadSchema,
	QueryPayloadSchema,
	ResponseEnvelopeSchema,
	SyncPayloadSchema,
	WireDeviceSchema,
} from './wire-schemas.js';
import type { RequestType, WireDevice } from './wire-schemas.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

// Error code the service uses for unreachable devices.
const DEVICE_OFFLINE_CODE = 'deviceOffline';

/** What the engine needs from the cloud service. */
export interface DeviceProtocol {
	discover(): Promise<Device[]>;
	query(deviceIds: readonly string[]): Promise<Map<string, StateSnapshot>>;
	execute(command: Command): Promise<StateSnapshot>;
}

export interface ProtocolClientOptions {
	endpoint: string;
	credentials: CredentialProvider;
	timeoutMs?: number;
	fetchImpl?: FetchLike;
	logger?: HomeLogger;
	newRequestId?: () => string;
}

function deviceName(wire: WireDevice): string {
	const name = wire.name;
	if (typeof name === 'string') {
		return name;
	}
	return name?.name ?? name?.defaultNames?.[0] ?? name?.nicknames?.[0] ?? '';
}

function resolveResultKey(key: string): CapabilityName | undefined {
	return CAPABILITY_NAMES.find((name) => name === key) ?? capabilityForWireKey(key);
}

export class ProtocolClient implements DeviceProtocol {
	private readonly log: HomeLogger;
	private readonly fetchImpl: FetchLike;
	private readonly timeoutMs: number;
	private readonly newRequestId: () => string;

	public constructor(private readonly options: ProtocolClientOptions) {
		this.log = options.logger ?? createConsoleLogger('cloudhome-protocol');
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.newRequestId = options.newRequestId ?? (() => uuidv4());
	}

	public async discover(): Promise<Device[]> {
		const payload = await this.request('SYNC', {});
		const parsed = SyncPayloadSchema.safeParse(payload);
		if (!parsed.success) {
			throw new ProtocolError('malformed-response', 'SYNC payload has no device list', { cause: parsed.error });
		}

		const devices: Device[] = [];
		const seen = new Set<string>();

		for (const entry of parsed.data.devices) {
			const wire = WireDeviceSchema.safeParse(entry);
			if (!wire.success) {
				this.log.warn('ProtocolClient: skipping malformed SYNC entry: %s', wire.error.message);
				continue;
			}

			try {
				const device = deviceFromDescriptor({
					id: wire.data.id,
					name: deviceName(wire.data),
					type: wire.data.type,
					traits: wire.data.traits,
					reportsState: wire.data.willReportState ?? true,
					info: {
						room: wire.data.roomHint,
						manufacturer: wire.data.deviceInfo?.manufacturer,
						model: wire.data.deviceInfo?.model,
						firmwareRevision: wire.data.deviceInfo?.swVersion,
						hardwareRevision: wire.data.deviceInfo?.hwVersion,
					},
				});

				if (seen.has(device.id)) {
					this.log.warn('ProtocolClient: SYNC listed device %s twice; keeping the first entry.', device.id);
					continue;
				}
				seen.add(device.id);
				devices.push(device);
			} catch (err) {
				if (err instanceof MergeDrop) {
					this.log.warn('ProtocolClient: skipping device %s: %s', err.deviceId, err.message);
					continue;
				}
				throw err;
			}
		}

		this.log.debug('ProtocolClient: SYNC returned %d usable device(s).', devices.length);
		return devices;
	}

	public async query(deviceIds: readonly string[]): Promise<Map<string, StateSnapshot>> {
		const result = new Map<string, StateSnapshot>();
		if (deviceIds.length === 0) {
			return result;
		}

		const payload = await this.request('QUERY', {
			devices: deviceIds.map((id) => ({ id })),
		});
		const parsed = QueryPayloadSchema.safeParse(payload);
		if (!parsed.success) {
			throw new ProtocolError('malformed-response', 'QUERY payload has no device states', { cause: parsed.error });
		}

		for (const id of deviceIds) {
			const wire = parsed.data.devices[id];
			if (!wire) {
				this.log.debug('ProtocolClient: QUERY returned no state for %s.', id);
				continue;
			}
			const decoded = decodeWireState(wire);
			if (decoded.invalid.length > 0) {
				this.log.debug('ProtocolClient: ignoring invalid state keys for %s: %s', id, decoded.invalid.join(', '));
			}
			result.set(id, decoded.online === undefined
				? { values: decoded.values }
				: { values: decoded.values, online: decoded.online });
		}

		return result;
	}

	public async execute(command: Command): Promise<StateSnapshot> {
		let payload: unknown;
		try {
			payload = await this.request('EXECUTE', {
				deviceId: command.deviceId,
				correlationToken: command.token,
				changes: encodeChanges(command.changes),
			});
		} catch (err) {
			if (err instanceof ProtocolError) {
				if (err.kind === 'timeout') {
					throw new ExecuteError('timeout', `command for ${command.deviceId} timed out`, { cause: err });
				}
				if (err.code === DEVICE_OFFLINE_CODE) {
					throw new ExecuteError('device-offline', `device ${command.deviceId} is offline`, { cause: err });
				}
				throw new ExecuteError('rejected', err.message, { cause: err });
			}
			throw err;
		}

		const parsed = ExecutePayloadSchema.safeParse(payload);
		if (!parsed.success || parsed.data.deviceId !== command.deviceId) {
			const cause = new ProtocolError('malformed-response', 'EXECUTE payload does not describe the commanded device');
			throw new ExecuteError('rejected', cause.message, { cause });
		}

		const decoded = decodeWireState(parsed.data.states);
		const state: StateSnapshot = decoded.online === undefined
			? { values: decoded.values }
			: { values: decoded.values, online: decoded.online };

		if (parsed.data.errorCode === DEVICE_OFFLINE_CODE || state.online === false) {
			throw new ExecuteError('device-offline', `device ${command.deviceId} is offline`, { state });
		}

		const requested = CAPABILITY_NAMES.filter((name) => command.changes[name] !== undefined);
		const outcomes: Partial<Record<CapabilityName, CapabilityOutcome>> = {};
		for (const capability of requested) {
			outcomes[capability] = { status: 'accepted' };
		}

		for (const [key, result] of Object.entries(parsed.data.results ?? {})) {
			const capability = resolveResultKey(key);
			if (!capability || !requested.includes(capability)) {
				continue;
			}
			outcomes[capability] = result.status === 'ERROR'
				? { status: 'rejected', errorCode: result.errorCode }
				: { status: 'accepted' };
		}

		const rejected = requested.filter((capability) => outcomes[capability]?.status === 'rejected');
		if (rejected.length === 0) {
			return state;
		}

		if (rejected.length < requested.length) {
			throw new ExecuteError(
				'partial-failure',
				`device ${command.deviceId} rejected ${rejected.join(', ')}`,
				{ outcomes, state },
			);
		}

		const offline = rejected.every((capability) => outcomes[capability]?.errorCode === DEVICE_OFFLINE_CODE);
		throw new ExecuteError(
			offline ? 'device-offline' : 'rejected',
			`device ${command.deviceId} rejected the command`,
			{ outcomes, state },
		);
	}

	/**
	 * Send one envelope. A 401/403 refreshes the credential and retries once.
	 */
	private async request(type: RequestType, payload: unknown): Promise<unknown> {
		try {
			return await this.requestOnce(type, payload);
		} catch (err) {
			if (!(err instanceof ProtocolError) || err.kind !== 'unauthorized') {
				throw err;
			}
			this.log.info('ProtocolClient: %s was unauthorized; refreshing credential and retrying once.', type);
			await this.options.credentials.refresh();
			return this.requestOnce(type, payload);
		}
	}

	private async requestOnce(type: RequestType, payload: unknown): Promise<unknown> {
		const credential = await this.options.credentials.current();
		const requestId = this.newRequestId();
		const controller = new AbortController();

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(() => {
				controller.abort();
				reject(new ProtocolError('timeout', `${type} timed out after ${this.timeoutMs} ms`));
			}, this.timeoutMs);
		});

		try {
			return await Promise.race([
				this.send(type, requestId, payload, credential.accessToken, controller.signal),
				timeout,
			]);
		} finally {
			clearTimeout(timer);
		}
	}

	private async send(
		type: RequestType,
		requestId: string,
		payload: unknown,
		accessToken: string,
		signal: AbortSignal,
	): Promise<unknown> {
		let res: Response;
		let text: string;
		try {
			res = await this.fetchImpl(this.options.endpoint, {
				method: 'POST',
				headers: {
					'Content-Type': 'application/json',
					Authorization: `Bearer ${accessToken}`,
				},
				body: JSON.stringify({ requestId, type, payload }),
				signal,
			});
			text = await res.text();
		} catch (err) {
			throw new ProtocolError('server-error', `${type} request failed: ${describeError(err)}`, { cause: err });
		}

		if (res.status === 401 || res.status === 403) {
			throw new ProtocolError('unauthorized', `${type} rejected the access token (HTTP ${res.status})`);
		}
		if (!res.ok) {
			this.log.error('ProtocolClient: %s failed: HTTP %d %s', type, res.status, res.statusText);
			throw new ProtocolError('server-error', `${type} failed with status ${res.status}`);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			throw new ProtocolError('malformed-response', `${type} returned non-JSON payload`, { cause: err });
		}

		const envelope = ResponseEnvelopeSchema.safeParse(json);
		if (!envelope.success) {
			throw new ProtocolError('malformed-response', `${type} response is not an envelope`, { cause: envelope.error });
		}
		if (envelope.data.requestId !== requestId) {
			throw new ProtocolError(
				'malformed-response',
				`${type} response echoed requestId ${envelope.data.requestId}, expected ${requestId}`,
			);
		}
		if (envelope.data.status === 'ERROR') {
			const code = envelope.data.error?.code;
			throw new ProtocolError(
				'server-error',
				envelope.data.error?.message ?? `${type} failed${code ? ` (${code})` : ''}`,
				{ code },
			);
		}

		return envelope.data.payload;
	}
}
