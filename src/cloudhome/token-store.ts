// src/cloudhome/token-store.ts
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { createConsoleLogger } from './types.js';
import type { HomeLogger } from './types.js';

export interface StoredCredential {
	username: string;
	accessToken: string;
	refreshToken?: string;
	/** Epoch milliseconds. */
	expiresAt: number;
}

function isStoredCredential(value: unknown): value is StoredCredential {
	if (typeof value !== 'object' || value === null) {
		return false;
	}
	const v: Record<string, unknown> = { ...value };
	return (
		typeof v.username === 'string' &&
		typeof v.accessToken === 'string' &&
		typeof v.expiresAt === 'number' &&
		(v.refreshToken === undefined || typeof v.refreshToken === 'string')
	);
}

/**
 * JSON credential store under the Homebridge storage path.
 *
 * Files are stored at:
 *   <storagePath>/cloudhome-sync/tokens.json
 */
export class TokenStore {
	private readonly dirPath: string;
	private readonly filePath: string;
	private readonly log: HomeLogger;

	public constructor(storagePath: string, logger?: HomeLogger) {
		this.dirPath = path.join(storagePath, 'cloudhome-sync');
		this.filePath = path.join(this.dirPath, 'tokens.json');
		this.log = logger ?? createConsoleLogger('cloudhome-tokens');
	}

	/**
	 * Returns the stored credential, or null when there is none. An expired
	 * access token is still returned: its refresh token may be usable.
	 */
	public async load(): Promise<StoredCredential | null> {
		let raw: string;
		try {
			raw = await fs.readFile(this.filePath, 'utf8');
		} catch (err) {
			if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
				return null;
			}
			this.log.warn('TokenStore: could not read %s: %s', this.filePath, String(err));
			return null;
		}

		try {
			const data: unknown = JSON.parse(raw);
			if (!isStoredCredential(data)) {
				this.log.warn('TokenStore: ignoring malformed token file %s', this.filePath);
				return null;
			}
			return data;
		} catch (err) {
			this.log.warn('TokenStore: token file is not valid JSON: %s', String(err));
			return null;
		}
	}

	public async save(data: StoredCredential): Promise<void> {
		const json = JSON.stringify(data, null, 2);

		await fs.mkdir(this.dirPath, { recursive: true });
		await fs.writeFile(this.filePath, json, { encoding: 'utf8', mode: 0o600 });
	}

	public async clear(): Promise<void> {
		try {
			await fs.unlink(this.filePath);
		} catch (err) {
			if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
				return;
			}
			throw err;
		}
	}
}
