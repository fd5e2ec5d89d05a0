// src/cloudhome/wire-schemas.ts
import { z } from 'zod';

export const RequestTypeSchema = z.enum(['SYNC', 'QUERY', 'EXECUTE']);
export type RequestType = z.infer<typeof RequestTypeSchema>;

export const ResponseEnvelopeSchema = z.object({
	requestId: z.string(),
	status: z.enum(['SUCCESS', 'ERROR']),
	payload: z.unknown().optional(),
	error: z
		.object({
			code: z.string().optional(),
			message: z.string().optional(),
		})
		.optional(),
});
export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;

const DeviceNameSchema = z.union([
	z.string(),
	z.object({
		name: z.string().optional(),
		defaultNames: z.array(z.string()).optional(),
		nicknames: z.array(z.string()).optional(),
	}),
]);

export const WireDeviceSchema = z.object({
	id: z.union([z.string(), z.number()]).transform((id) => String(id)),
	type: z.string(),
	traits: z.array(z.string()).default([]),
	name: DeviceNameSchema.optional(),
	roomHint: z.string().optional(),
	willReportState: z.boolean().optional(),
	deviceInfo: z
		.object({
			manufacturer: z.string().optional(),
			model: z.string().optional(),
			hwVersion: z.string().optional(),
			swVersion: z.string().optional(),
		})
		.optional(),
});
export type WireDevice = z.infer<typeof WireDeviceSchema>;

// Devices are validated one at a time so a single bad entry does not sink the SYNC.
export const SyncPayloadSchema = z.object({
	devices: z.array(z.unknown()),
});

export const WireStateSchema = z.record(z.string(), z.unknown());
export type WireState = z.infer<typeof WireStateSchema>;

export const QueryPayloadSchema = z.object({
	devices: z.record(z.string(), WireStateSchema),
});

export const ExecuteResultSchema = z.object({
	status: z.enum(['SUCCESS', 'ERROR', 'PENDING']),
	errorCode: z.string().optional(),
});

export const ExecutePayloadSchema = z.object({
	deviceId: z.string(),
	states: WireStateSchema.default({}),
	results: z.record(z.string(), ExecuteResultSchema).optional(),
	errorCode: z.string().optional(),
});
export type ExecutePayload = z.infer<typeof ExecutePayloadSchema>;

/**
 * Token endpoint response. The login path may wrap the body in a
 * `{ body: "<json>" }` envelope; callers unwrap that first.
 */
export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	refresh_token: z.string().optional(),
	expires_in: z.coerce.number().positive().optional(),
	token_type: z.string().optional(),
});
export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const WrappedBodySchema = z.object({
	body: z.string(),
});

export const PushMessageSchema = z
	.object({
		deviceId: z.union([z.string(), z.number()]).transform((id) => String(id)).optional(),
		timestamp: z.union([z.number(), z.string()]).optional(),
		seq: z.number().int().nonnegative().optional(),
	})
	.passthrough();
export type PushMessage = z.infer<typeof PushMessageSchema>;
