// src/cloudhome/auth-client.ts
//
// Password login plus refresh-token grant against the account's token service.

import { AuthError, ProtocolError, describeError } from './errors.js';
import type { TokenStore } from './token-store.js';
import { createConsoleLogger } from './types.js';
import type { CredentialProvider, HomeLogger, SessionCredential } from './types.js';
import { TokenResponseSchema, WrappedBodySchema } from './wire-schemas.js';
import type { TokenResponse } from './wire-schemas.js';

export type FetchLike = typeof fetch;

// Tokens this close to expiry are treated as expired.
export const EXPIRY_MARGIN_MS = 5 * 60 * 1000;
const DEFAULT_EXPIRES_IN_S = 3600;

export interface AuthClientOptions {
	username: string;
	password: string;
	loginUrl: string;
	tokenUrl: string;
	clientId: string;
	timeoutMs?: number;
	tokenStore?: TokenStore;
	fetchImpl?: FetchLike;
	now?: () => number;
	logger?: HomeLogger;
}

export class CloudAuthClient implements CredentialProvider {
	private readonly log: HomeLogger;
	private readonly fetchImpl: FetchLike;
	private readonly now: () => number;
	private readonly timeoutMs: number;

	private credential: SessionCredential | null = null;
	private storeLoaded = false;
	private inflight: Promise<SessionCredential> | null = null;

	public constructor(private readonly options: AuthClientOptions) {
		this.log = options.logger ?? createConsoleLogger('cloudhome-auth');
		this.fetchImpl = options.fetchImpl ?? fetch;
		this.now = options.now ?? Date.now;
		this.timeoutMs = options.timeoutMs ?? 10_000;
	}

	public isValid(credential: SessionCredential): boolean {
		return this.now() < credential.expiresAt - EXPIRY_MARGIN_MS;
	}

	public async current(): Promise<SessionCredential> {
		if (this.inflight) {
			return this.inflight;
		}

		if (!this.storeLoaded) {
			this.storeLoaded = true;
			await this.loadStored();
		}

		if (this.credential && this.isValid(this.credential)) {
			return this.credential;
		}

		return this.refresh();
	}

	public refresh(): Promise<SessionCredential> {
		if (!this.inflight) {
			this.inflight = this.obtain().finally(() => {
				this.inflight = null;
			});
		}
		return this.inflight;
	}

	/** Forget the cached credential, e.g. after the user changes accounts. */
	public async reset(): Promise<void> {
		this.credential = null;
		await this.options.tokenStore?.clear();
	}

	private async loadStored(): Promise<void> {
		const stored = await this.options.tokenStore?.load();
		if (!stored) {
			return;
		}
		if (stored.username !== this.options.username) {
			this.log.info('CloudAuthClient: stored token belongs to a different account; ignoring it.');
			return;
		}
		this.credential = {
			accessToken: stored.accessToken,
			refreshToken: stored.refreshToken,
			expiresAt: stored.expiresAt,
		};
		this.log.debug('CloudAuthClient: loaded stored token (expires %s).', new Date(stored.expiresAt).toISOString());
	}

	private async obtain(): Promise<SessionCredential> {
		const refreshToken = this.credential?.refreshToken;
		let next: SessionCredential | null = null;

		if (refreshToken) {
			try {
				next = await this.refreshGrant(refreshToken);
				this.log.debug('CloudAuthClient: access token refreshed.');
			} catch (err) {
				this.log.warn('CloudAuthClient: refresh failed, doing a fresh login: %s', describeError(err));
			}
		}

		if (!next) {
			next = await this.passwordLogin();
			this.log.info('CloudAuthClient: signed in as %s.', this.options.username);
		}

		this.credential = next;
		await this.persist(next);
		return next;
	}

	private async persist(credential: SessionCredential): Promise<void> {
		const store = this.options.tokenStore;
		if (!store) {
			return;
		}
		try {
			await store.save({ username: this.options.username, ...credential });
		} catch (err) {
			this.log.warn('CloudAuthClient: failed to persist token: %s', describeError(err));
		}
	}

	private async passwordLogin(): Promise<SessionCredential> {
		const { username, password, loginUrl } = this.options;
		if (!username || !password) {
			throw new AuthError('missing-credentials', 'username or password is missing from config');
		}

		const res = await this.post(loginUrl, {
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify({ username: username.trim(), password, grant_type: 'password' }),
		});

		if (res.status === 400 || res.status === 401) {
			throw new AuthError('invalid-credentials', 'invalid username or password');
		}

		const tokens = await this.readTokens(res, 'login');
		return this.toCredential(tokens, undefined);
	}

	private async refreshGrant(refreshToken: string): Promise<SessionCredential> {
		const form = new URLSearchParams({
			grant_type: 'refresh_token',
			client_id: this.options.clientId,
			refresh_token: refreshToken,
		});

		const res = await this.post(this.options.tokenUrl, {
			headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
			body: form.toString(),
		});

		if (res.status === 400 || res.status === 401) {
			throw new AuthError('refresh-rejected', 'refresh token invalid or expired');
		}

		const tokens = await this.readTokens(res, 'refresh');
		// The refresh grant usually does not rotate the refresh token.
		return this.toCredential(tokens, refreshToken);
	}

	private async post(url: string, init: { headers: Record<string, string>; body: string }): Promise<Response> {
		try {
			return await this.fetchImpl(url, {
				method: 'POST',
				headers: init.headers,
				body: init.body,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
		} catch (err) {
			throw new ProtocolError('server-error', `token request to ${url} failed: ${describeError(err)}`, { cause: err });
		}
	}

	private async readTokens(res: Response, what: string): Promise<TokenResponse> {
		const text = await res.text();

		if (!res.ok) {
			this.log.error('CloudAuthClient: %s failed: HTTP %d %s', what, res.status, res.statusText);
			throw new ProtocolError('server-error', `${what} failed with status ${res.status}`);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			throw new ProtocolError('malformed-response', `${what} returned non-JSON payload`, { cause: err });
		}

		// The login endpoint wraps its JSON in a { body: "<json>" } envelope.
		const wrapped = WrappedBodySchema.safeParse(json);
		if (wrapped.success) {
			try {
				json = JSON.parse(wrapped.data.body);
			} catch (err) {
				throw new ProtocolError('malformed-response', `${what} returned a non-JSON body`, { cause: err });
			}
		}

		const parsed = TokenResponseSchema.safeParse(json);
		if (!parsed.success) {
			throw new ProtocolError('malformed-response', `${what} response has no access_token`, {
				cause: parsed.error,
			});
		}
		return parsed.data;
	}

	private toCredential(tokens: TokenResponse, fallbackRefresh: string | undefined): SessionCredential {
		const expiresIn = tokens.expires_in ?? DEFAULT_EXPIRES_IN_S;
		return {
			accessToken: tokens.access_token,
			refreshToken: tokens.refresh_token ?? fallbackRefresh,
			expiresAt: this.now() + expiresIn * 1000,
		};
	}
}
