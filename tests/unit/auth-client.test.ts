import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';

import { CloudAuthClient, EXPIRY_MARGIN_MS } from '../../src/cloudhome/auth-client.js';
import type { AuthClientOptions, FetchLike } from '../../src/cloudhome/auth-client.js';
import { AuthError } from '../../src/cloudhome/errors.js';
import { TokenStore } from '../../src/cloudhome/token-store.js';
import { makeLogger } from './helpers.js';

const LOGIN_URL = 'https://api.example.test/login';
const TOKEN_URL = 'https://auth.example.test/oauth/token';
const T0 = 1_700_000_000_000;

type Route = (body: string) => Response | Promise<Response>;

function json(value: unknown, status = 200): Response {
	return new Response(JSON.stringify(value), { status });
}

describe('CloudAuthClient', () => {
	let now: number;
	let routes: Map<string, Route>;
	let fetchImpl: Mock<FetchLike>;

	beforeEach(() => {
		now = T0;
		routes = new Map();
		fetchImpl = vi.fn<FetchLike>(async (input, init) => {
			const route = routes.get(String(input));
			if (!route) {
				return new Response('not found', { status: 404 });
			}
			return route(typeof init?.body === 'string' ? init.body : '');
		});
	});

	function client(overrides: Partial<AuthClientOptions> = {}): CloudAuthClient {
		return new CloudAuthClient({
			username: 'user@example.test',
			password: 'test-password',
			loginUrl: LOGIN_URL,
			tokenUrl: TOKEN_URL,
			clientId: 'test-client',
			fetchImpl,
			now: () => now,
			logger: makeLogger(),
			...overrides,
		});
	}

	function urls(): string[] {
		return fetchImpl.mock.calls.map(([input]) => String(input));
	}

	it('signs in with the password and unwraps the body envelope', async () => {
		let loginBody = '';
		routes.set(LOGIN_URL, (body) => {
			loginBody = body;
			return json({ body: JSON.stringify({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 7200 }) });
		});

		await expect(client().current()).resolves.toEqual({
			accessToken: 'test-access',
			refreshToken: 'test-refresh',
			expiresAt: T0 + 7_200_000,
		});
		expect(JSON.parse(loginBody)).toEqual({
			username: 'user@example.test',
			password: 'test-password',
			grant_type: 'password',
		});
	});

	it('defaults the lifetime to one hour', async () => {
		routes.set(LOGIN_URL, () => json({ access_token: 'test-access' }));
		expect((await client().current()).expiresAt).toBe(T0 + 3_600_000);
	});

	it('shares one request between concurrent callers', async () => {
		routes.set(LOGIN_URL, () => json({ access_token: 'test-access', refresh_token: 'test-refresh' }));
		const auth = client();

		const [a, b, c] = await Promise.all([auth.current(), auth.refresh(), auth.current()]);

		expect(fetchImpl).toHaveBeenCalledTimes(1);
		expect(a).toBe(b);
		expect(b).toBe(c);
	});

	it('reuses a credential until it is within the expiry margin', async () => {
		routes.set(LOGIN_URL, () => json({ access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 3600 }));
		routes.set(TOKEN_URL, () => json({ access_token: 'test-access-2', expires_in: 3600 }));
		const auth = client();

		await auth.current();
		now = T0 + 3_600_000 - EXPIRY_MARGIN_MS - 1;
		expect((await auth.current()).accessToken).toBe('test-access');

		now = T0 + 3_600_000 - EXPIRY_MARGIN_MS;
		const renewed = await auth.current();

		expect(renewed).toEqual({ accessToken: 'test-access-2', refreshToken: 'test-refresh', expiresAt: now + 3_600_000 });
		expect(urls()).toEqual([LOGIN_URL, TOKEN_URL]);
	});

	it('sends the refresh grant as a form', async () => {
		let form = '';
		routes.set(LOGIN_URL, () => json({ access_token: 'test-access', refresh_token: 'test-refresh' }));
		routes.set(TOKEN_URL, (body) => {
			form = body;
			return json({ access_token: 'test-access-2', refresh_token: 'test-refresh-2' });
		});
		const auth = client();

		await auth.current();
		const renewed = await auth.refresh();

		expect(Object.fromEntries(new URLSearchParams(form))).toEqual({
			grant_type: 'refresh_token',
			client_id: 'test-client',
			refresh_token: 'test-refresh',
		});
		expect(renewed.refreshToken).toBe('test-refresh-2');
	});

	it('falls back to a password login when the refresh is rejected', async () => {
		let logins = 0;
		routes.set(LOGIN_URL, () => {
			logins++;
			return json({ access_token: `test-access-${logins}`, refresh_token: 'test-refresh' });
		});
		routes.set(TOKEN_URL, () => json({ error: 'invalid_grant' }, 400));
		const log = makeLogger();
		const auth = client({ logger: log });

		await auth.current();
		const renewed = await auth.refresh();

		expect(renewed.accessToken).toBe('test-access-2');
		expect(urls()).toEqual([LOGIN_URL, TOKEN_URL, LOGIN_URL]);
		expect(log.warn).toHaveBeenCalledWith(
			'CloudAuthClient: refresh failed, doing a fresh login: %s',
			'refresh token invalid or expired',
		);
	});

	it('raises AuthError for rejected passwords', async () => {
		routes.set(LOGIN_URL, () => json({ message: 'Unauthorized' }, 401));
		const err = await client().current().catch((caught: unknown) => caught);
		expect(err).toBeInstanceOf(AuthError);
		expect(err).toMatchObject({ kind: 'invalid-credentials' });
	});

	it('raises AuthError without calling out when the password is missing', async () => {
		await expect(client({ password: '' }).current()).rejects.toMatchObject({ kind: 'missing-credentials' });
		expect(fetchImpl).not.toHaveBeenCalled();
	});

	it('reports responses without an access token as malformed', async () => {
		routes.set(LOGIN_URL, () => json({ token_type: 'Bearer' }));
		await expect(client().current()).rejects.toMatchObject({
			name: 'ProtocolError',
			kind: 'malformed-response',
			message: 'login response has no access_token',
		});
	});

	it('reports server failures', async () => {
		routes.set(LOGIN_URL, () => new Response('', { status: 502 }));
		await expect(client().current()).rejects.toMatchObject({
			kind: 'server-error',
			message: 'login failed with status 502',
		});
	});

	describe('with a token store', () => {
		let dir: string;

		beforeEach(async () => {
			dir = await mkdtemp(join(tmpdir(), 'cloudhome-auth-'));
		});

		afterEach(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it('persists the credential privately and reuses it on the next start', async () => {
			routes.set(LOGIN_URL, () => json({ access_token: 'test-access', refresh_token: 'test-refresh' }));
			await client({ tokenStore: new TokenStore(dir) }).current();

			const file = join(dir, 'cloudhome-sync', 'tokens.json');
			expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({
				username: 'user@example.test',
				accessToken: 'test-access',
				refreshToken: 'test-refresh',
				expiresAt: T0 + 3_600_000,
			});
			expect((await stat(file)).mode & 0o777).toBe(0o600);

			const restarted = client({ tokenStore: new TokenStore(dir) });
			expect((await restarted.current()).accessToken).toBe('test-access');
			expect(fetchImpl).toHaveBeenCalledTimes(1);
		});

		it('ignores a token stored for another account', async () => {
			const store = new TokenStore(dir);
			await store.save({ username: 'someone@example.test', accessToken: 'test-other', expiresAt: T0 + 3_600_000 });
			routes.set(LOGIN_URL, () => json({ access_token: 'test-access' }));

			expect((await client({ tokenStore: store }).current()).accessToken).toBe('test-access');
		});

		it('forgets the credential on reset', async () => {
			const store = new TokenStore(dir);
			routes.set(LOGIN_URL, () => json({ access_token: 'test-access' }));
			const auth = client({ tokenStore: store });
			await auth.current();

			await auth.reset();

			expect(await store.load()).toBeNull();
			await auth.reset();
		});
	});
});

describe('TokenStore', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'cloudhome-tokens-'));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('returns null when nothing is stored', async () => {
		expect(await new TokenStore(dir).load()).toBeNull();
	});

	it('ignores a malformed file', async () => {
		const log = makeLogger();
		await mkdir(join(dir, 'cloudhome-sync'));
		const file = join(dir, 'cloudhome-sync', 'tokens.json');
		await writeFile(file, JSON.stringify({ accessToken: 42 }));

		expect(await new TokenStore(dir, log).load()).toBeNull();
		expect(log.warn).toHaveBeenCalledWith('TokenStore: ignoring malformed token file %s', file);
	});
});
