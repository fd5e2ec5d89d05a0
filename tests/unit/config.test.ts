import type { PlatformConfig } from 'homebridge';
import { describe, expect, it } from 'vitest';

import { ConfigError, parsePlatformConfig } from '../../src/config.js';

const VALID: PlatformConfig = {
	platform: 'CloudHome',
	username: ' user@example.test ',
	password: ' test-password ',
	apiUrl: 'https://api.example.test/v1/',
	tokenUrl: 'https://auth.example.test/oauth/token',
	clientId: 'test-client',
	mqttHost: 'broker.example.test',
	authorizerName: 'test-authorizer',
};

function problemsOf(config: PlatformConfig): string[] {
	try {
		parsePlatformConfig(config);
	} catch (err) {
		if (err instanceof ConfigError) {
			return err.problems;
		}
		throw err;
	}
	return [];
}

describe('parsePlatformConfig', () => {
	it('fills in defaults', () => {
		expect(parsePlatformConfig(VALID)).toEqual({
			name: 'CloudHome',
			username: 'user@example.test',
			password: ' test-password ',
			apiUrl: 'https://api.example.test/v1',
			tokenUrl: 'https://auth.example.test/oauth/token',
			clientId: 'test-client',
			mqttHost: 'broker.example.test',
			mqttPort: 443,
			authorizerName: 'test-authorizer',
			topicPrefix: 'devices',
			requestTimeoutMs: 10_000,
			stalenessWindowMs: 30_000,
			backoffInitialMs: 1_000,
			backoffMaxMs: 60_000,
			rediscoverIntervalMinutes: 60,
			coverSnapToEnds: false,
		});
	});

	it('accepts email as the username and numeric strings', () => {
		const parsed = parsePlatformConfig({
			...VALID,
			username: undefined,
			email: 'other@example.test',
			mqttPort: '8883',
			topicPrefix: 'home/devices/',
			coverSnapToEnds: true,
		});
		expect(parsed.username).toBe('other@example.test');
		expect(parsed.mqttPort).toBe(8883);
		expect(parsed.topicPrefix).toBe('home/devices');
		expect(parsed.coverSnapToEnds).toBe(true);
	});

	it('lists every problem at once', () => {
		expect(problemsOf({
			platform: 'CloudHome',
			apiUrl: 'ftp://api.example.test',
			tokenUrl: 'https://auth.example.test/oauth/token',
			mqttPort: 0,
			backoffInitialMs: 5_000,
			backoffMaxMs: 1_000,
		})).toEqual([
			'username is required',
			'password is required',
			'clientId is required',
			'mqttHost is required',
			'authorizerName is required',
			'apiUrl must be an http(s) URL',
			'mqttPort must be a number >= 1',
			'backoffMaxMs must not be lower than backoffInitialMs',
		]);
	});

	it('rejects non-numeric values', () => {
		expect(problemsOf({ ...VALID, stalenessWindowMs: 'soon' })).toEqual(['stalenessWindowMs must be a number >= 0']);
	});
});
