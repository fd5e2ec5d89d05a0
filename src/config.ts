// src/config.ts
import type { PlatformConfig } from 'homebridge';

import { PLATFORM_NAME } from './settings.js';

export interface CloudHomeConfig {
	name: string;
	username: string;
	password: string;
	/** Base URL; login is `<apiUrl>/login`, SYNC/QUERY/EXECUTE go to `<apiUrl>/smarthome`. */
	apiUrl: string;
	tokenUrl: string;
	clientId: string;
	mqttHost: string;
	mqttPort: number;
	authorizerName: string;
	topicPrefix: string;
	requestTimeoutMs: number;
	stalenessWindowMs: number;
	backoffInitialMs: number;
	backoffMaxMs: number;
	rediscoverIntervalMinutes: number;
	coverSnapToEnds: boolean;
}

export class ConfigError extends Error {
	public readonly problems: string[];

	constructor(problems: string[]) {
		super(`invalid platform config: ${problems.join('; ')}`);
		this.name = 'ConfigError';
		this.problems = problems;
	}
}

const REQUIRED_STRINGS = [
	'username',
	'password',
	'apiUrl',
	'tokenUrl',
	'clientId',
	'mqttHost',
	'authorizerName',
] as const;

function readString(raw: Record<string, unknown>, key: string): string {
	const value = raw[key];
	return typeof value === 'string' ? value.trim() : '';
}

function readNumber(
	raw: Record<string, unknown>,
	key: string,
	fallback: number,
	min: number,
	problems: string[],
): number {
	const value = raw[key];
	if (value === undefined || value === null || value === '') {
		return fallback;
	}
	const n = typeof value === 'number' ? value : Number(value);
	if (!Number.isFinite(n) || n < min) {
		problems.push(`${key} must be a number >= ${min}`);
		return fallback;
	}
	return n;
}

function stripTrailingSlash(url: string): string {
	return url.replace(/\/+$/, '');
}

/**
 * Narrow the raw Homebridge platform block. Throws ConfigError listing every
 * problem found.
 */
export function parsePlatformConfig(config: PlatformConfig): CloudHomeConfig {
	const raw: Record<string, unknown> = { ...config };
	const problems: string[] = [];

	// `email` is accepted as an alias for username.
	const username = readString(raw, 'username') || readString(raw, 'email');
	const strings: Record<typeof REQUIRED_STRINGS[number], string> = {
		username,
		// Passwords are not trimmed.
		password: typeof raw.password === 'string' ? raw.password : '',
		apiUrl: stripTrailingSlash(readString(raw, 'apiUrl')),
		tokenUrl: readString(raw, 'tokenUrl'),
		clientId: readString(raw, 'clientId'),
		mqttHost: readString(raw, 'mqttHost'),
		authorizerName: readString(raw, 'authorizerName'),
	};

	for (const key of REQUIRED_STRINGS) {
		if (!strings[key]) {
			problems.push(`${key} is required`);
		}
	}

	for (const key of ['apiUrl', 'tokenUrl'] as const) {
		const url = strings[key];
		if (url && !/^https?:\/\//.test(url)) {
			problems.push(`${key} must be an http(s) URL`);
		}
	}

	const mqttPort = readNumber(raw, 'mqttPort', 443, 1, problems);
	const requestTimeoutMs = readNumber(raw, 'requestTimeoutMs', 10_000, 1, problems);
	const stalenessWindowMs = readNumber(raw, 'stalenessWindowMs', 30_000, 0, problems);
	const backoffInitialMs = readNumber(raw, 'backoffInitialMs', 1_000, 1, problems);
	const backoffMaxMs = readNumber(raw, 'backoffMaxMs', 60_000, 1, problems);
	const rediscoverIntervalMinutes = readNumber(raw, 'rediscoverIntervalMinutes', 60, 0, problems);

	if (backoffMaxMs < backoffInitialMs) {
		problems.push('backoffMaxMs must not be lower than backoffInitialMs');
	}

	const topicPrefix = readString(raw, 'topicPrefix').replace(/\/+$/, '') || 'devices';

	if (problems.length > 0) {
		throw new ConfigError(problems);
	}

	return {
		name: readString(raw, 'name') || PLATFORM_NAME,
		...strings,
		mqttPort,
		topicPrefix,
		requestTimeoutMs,
		stalenessWindowMs,
		backoffInitialMs,
		backoffMaxMs,
		rediscoverIntervalMinutes,
		coverSnapToEnds: raw.coverSnapToEnds === true,
	};
}
