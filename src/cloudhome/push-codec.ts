// src/cloudhome/push-codec.ts
//
// Push message -> PushDelta. Topic is `<topicPrefix>/<deviceId>`; payload is
// JSON carrying capability values (by capability name or wire key), a
// timestamp and an optional transport sequence number.

import { writeCapability } from './device-catalog.js';
import { capabilityForWireKey } from './state-codec.js';
import { CAPABILITY_NAMES } from './types.js';
import type { CapabilityName, HomeLogger, PushDelta, StateValues } from './types.js';
import { PushMessageSchema } from './wire-schemas.js';

const RESERVED_KEYS = new Set(['deviceId', 'timestamp', 'seq', 'online']);

export function deviceTopic(topicPrefix: string, deviceId: string): string {
	return `${topicPrefix}/${deviceId}`;
}

export function deviceIdFromTopic(topicPrefix: string, topic: string): string | null {
	const prefix = `${topicPrefix}/`;
	if (!topic.startsWith(prefix)) {
		return null;
	}
	const rest = topic.slice(prefix.length);
	return rest && !rest.includes('/') ? rest : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolveKey(key: string): CapabilityName | undefined {
	return CAPABILITY_NAMES.find((name) => name === key) ?? capabilityForWireKey(key);
}

/** Accepts epoch milliseconds, epoch seconds or an ISO-8601 string. */
export function parseTimestamp(raw: number | string | undefined): number | null {
	if (raw === undefined) {
		return null;
	}
	if (typeof raw === 'number') {
		if (!Number.isFinite(raw)) {
			return null;
		}
		// Anything before 2001-09-09 in ms is taken to be seconds.
		return raw < 1e12 ? Math.round(raw * 1000) : raw;
	}
	const numeric = Number(raw);
	if (raw.trim() !== '' && Number.isFinite(numeric)) {
		return parseTimestamp(numeric);
	}
	const parsed = Date.parse(raw);
	return Number.isNaN(parsed) ? null : parsed;
}

export interface PushCodecOptions {
	topicPrefix: string;
	logger: HomeLogger;
	now: () => number;
}

/**
 * Returns null (after logging) for anything that is not a usable delta.
 */
export function decodePush(topic: string, payload: Buffer | string, options: PushCodecOptions): PushDelta | null {
	const { logger: log } = options;
	const topicDeviceId = deviceIdFromTopic(options.topicPrefix, topic);
	if (!topicDeviceId) {
		log.debug('Push: ignoring message on unexpected topic %s', topic);
		return null;
	}

	let json: unknown;
	try {
		json = JSON.parse(typeof payload === 'string' ? payload : payload.toString('utf8'));
	} catch {
		log.warn('Push: payload on %s is not JSON; dropping it.', topic);
		return null;
	}

	// Some publishers wrap the state as { body: { data: {...} } }.
	if (isRecord(json) && isRecord(json.body) && isRecord(json.body.data)) {
		json = json.body.data;
	}

	const parsed = PushMessageSchema.safeParse(json);
	if (!parsed.success) {
		log.warn('Push: malformed message on %s: %s', topic, parsed.error.message);
		return null;
	}

	const message = parsed.data;
	if (message.deviceId !== undefined && message.deviceId !== topicDeviceId) {
		log.warn('Push: message for %s arrived on topic of %s; dropping it.', message.deviceId, topicDeviceId);
		return null;
	}

	const values: StateValues = {};
	for (const [key, raw] of Object.entries(message)) {
		if (RESERVED_KEYS.has(key)) {
			continue;
		}
		if (key === 'color' && isRecord(raw)) {
			if (!writeCapability(values, 'color_temperature', raw.temperatureK)) {
				log.debug('Push: ignoring invalid color for %s', topicDeviceId);
			}
			continue;
		}
		const capability = resolveKey(key);
		if (!capability) {
			log.debug('Push: ignoring unknown key %s for %s', key, topicDeviceId);
			continue;
		}
		if (!writeCapability(values, capability, raw)) {
			log.debug('Push: ignoring invalid %s value for %s', key, topicDeviceId);
		}
	}

	const at = parseTimestamp(message.timestamp) ?? options.now();
	return {
		deviceId: topicDeviceId,
		values,
		order: message.seq === undefined ? { at } : { at, seq: message.seq },
		...(typeof message.online === 'boolean' ? { online: message.online } : {}),
	};
}
