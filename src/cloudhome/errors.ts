// src/cloudhome/errors.ts
import { CAPABILITY_NAMES } from './types.js';
import type { CapabilityName, StateSnapshot } from './types.js';

export type ConnectErrorKind = 'network' | 'credential-expired' | 'protocol-negotiation-failed';

/**
 * Raised by the transport session when a connection attempt fails. Recovered
 * internally by the reconnect loop; callers only see it from connect().
 */
export class ConnectError extends Error {
	public readonly kind: ConnectErrorKind;

	constructor(kind: ConnectErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'ConnectError';
		this.kind = kind;
	}
}

export type ProtocolErrorKind = 'timeout' | 'malformed-response' | 'server-error' | 'unauthorized';

export class ProtocolError extends Error {
	public readonly kind: ProtocolErrorKind;
	/** Error code reported by the service in an ERROR envelope, if any. */
	public readonly code?: string;

	constructor(
		kind: ProtocolErrorKind,
		message: string,
		options?: { cause?: unknown; code?: string },
	) {
		super(message, options);
		this.name = 'ProtocolError';
		this.kind = kind;
		this.code = options?.code;
	}
}

export type ExecuteErrorReason =
	| 'timeout'
	| 'partial-failure'
	| 'device-offline'
	| 'rejected'
	| 'session-closed';

export interface CapabilityOutcome {
	status: 'accepted' | 'rejected';
	errorCode?: string;
}

export class ExecuteError extends Error {
	public readonly reason: ExecuteErrorReason;
	/** Per-capability result when the service reported one. */
	public readonly outcomes: Partial<Record<CapabilityName, CapabilityOutcome>>;
	/** Device state the service reported alongside the failure. */
	public readonly state?: StateSnapshot;

	constructor(
		reason: ExecuteErrorReason,
		message: string,
		options?: {
			cause?: unknown;
			outcomes?: Partial<Record<CapabilityName, CapabilityOutcome>>;
			state?: StateSnapshot;
		},
	) {
		super(message, options);
		this.name = 'ExecuteError';
		this.reason = reason;
		this.outcomes = options?.outcomes ?? {};
		this.state = options?.state;
	}

	/** Capabilities the caller may retry on their own. */
	public failedCapabilities(): CapabilityName[] {
		return CAPABILITY_NAMES.filter((name) => this.outcomes[name]?.status === 'rejected');
	}
}

export type AuthErrorKind = 'invalid-credentials' | 'refresh-rejected' | 'missing-credentials';

/**
 * Fatal for the current session attempt; the host reports it as
 * "reauthentication required".
 */
export class AuthError extends Error {
	public readonly kind: AuthErrorKind;

	constructor(kind: AuthErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'AuthError';
		this.kind = kind;
	}
}

/** Surfaced once when the push session is torn down for good. */
export class SessionUnavailableError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'SessionUnavailableError';
	}
}

export type MergeDropReason = 'unknown-device' | 'stale-event' | 'invalid-device';

/**
 * Not an error surfaced to callers: the reconciler logs these and moves on.
 */
export class MergeDrop extends Error {
	public readonly reason: MergeDropReason;
	public readonly deviceId: string;

	constructor(reason: MergeDropReason, deviceId: string, message: string) {
		super(message);
		this.name = 'MergeDrop';
		this.reason = reason;
		this.deviceId = deviceId;
	}
}

export function describeError(err: unknown): string {
	if (err instanceof Error) {
		return err.message;
	}
	return String(err);
}
