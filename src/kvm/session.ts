// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Session establishment for PiKVM-compatible devices.
 *
 * POST /api/auth/login with form fields `user` and `passwd`. Depending on
 * firmware the token comes back either in the JSON result
 * (`{"ok": true, "result": {"token": "..."}}`) or as an `auth_token` cookie.
 * The token is then sent as `Cookie: auth_token=<token>` on every REST call
 * and on the WebSocket upgrade.
 */

import { z } from "zod/v4";
import { AuthError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { HttpConnection } from "./http.js";
import { SESSION_COOKIE } from "./protocol.js";
import type { Credential, Session } from "./types.js";

const loginResponseSchema = z.object({
	ok: z.boolean(),
	result: z.looseObject({ token: z.string().optional() }).optional(),
});

export class SessionAuthenticator {
	private session: Session | null = null;
	private pending: Promise<Session> | null = null;
	private generation = 0;
	private readonly credential: Credential;
	private readonly http: HttpConnection;
	private readonly log: Logger;

	constructor(credential: Credential, http: HttpConnection, logger: Logger) {
		this.credential = credential;
		this.http = http;
		this.log = logger.child({ component: "session" });
	}

	/** The cached session, if one is established. */
	get current(): Session | null {
		return this.session;
	}

	/**
	 * Return the cached session or log in. Concurrent callers share a single
	 * login exchange. A rejected login throws AuthError and is not retried.
	 */
	async ensureSession(): Promise<Session> {
		if (this.session) return this.session;
		if (this.pending) return this.pending;

		const generation = this.generation;
		const attempt = this.login().then(
			(session) => {
				// A close() during the exchange discards its result
				if (generation === this.generation) this.session = session;
				return session;
			},
		);
		this.pending = attempt;
		try {
			return await attempt;
		} finally {
			if (this.pending === attempt) this.pending = null;
		}
	}

	/**
	 * Drop the cached session so the next call logs in again. When `stale` is
	 * given, only that session is dropped; a newer one stays.
	 */
	invalidate(stale?: Session): void {
		if (stale && this.session !== stale) return;
		if (this.session) {
			this.log.warn("session invalidated");
		}
		this.session = null;
	}

	/** Forget the session and any login in flight. */
	destroy(): void {
		this.generation++;
		this.session = null;
		this.pending = null;
	}

	private async login(): Promise<Session> {
		const { username, password } = this.credential;
		this.log.debug({ username }, "logging in");

		const res = await this.http.send({
			method: "POST",
			path: "/api/auth/login",
			headers: { "Content-Type": "application/x-www-form-urlencoded" },
			body: new URLSearchParams({ user: username, passwd: password }).toString(),
		});
		const text = await res.text();

		if (res.status === 401 || res.status === 403) {
			throw new AuthError(`Login rejected for user ${username}`, "login_failed");
		}

		const body = parseLoginBody(text);
		if (!res.ok || !body?.ok) {
			throw new AuthError(`Login failed: HTTP ${res.status}`, "login_failed");
		}

		const token = body.result?.token || extractCookieFromHeader(res.headers.get("set-cookie"));
		if (!token) {
			throw new AuthError("Login response carried no session token", "no_token");
		}

		this.log.info({ username }, "session established");
		return { token, createdAt: Date.now() };
	}
}

function parseLoginBody(text: string): z.infer<typeof loginResponseSchema> | null {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch {
		return null;
	}
	const parsed = loginResponseSchema.safeParse(json);
	return parsed.success ? parsed.data : null;
}

/** Extract the session token from a Set-Cookie header value. */
export function extractCookieFromHeader(setCookie: string | null): string {
	const match = (setCookie ?? "").match(new RegExp(`${SESSION_COOKIE}=([^;\\s,]+)`));
	return match ? match[1] : "";
}

export function sessionCookie(session: Session): string {
	return `${SESSION_COOKIE}=${session.token}`;
}
