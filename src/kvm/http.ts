// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Raw HTTP access to the device: one keep-alive connection per client,
 * TLS verification as configured, network failures mapped to TransportError.
 */

import { Agent, type BodyInit, type Response, fetch } from "undici";
import { TransportError } from "../errors.js";
import type { Credential } from "./types.js";

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpRequest {
	readonly method: "GET" | "POST";
	readonly path: string;
	readonly params?: QueryParams;
	readonly headers?: Record<string, string>;
	readonly body?: BodyInit;
}

export class HttpConnection {
	private agent: Agent | null = null;
	private readonly credential: Credential;
	private readonly timeout: number;

	constructor(credential: Credential, timeout: number) {
		this.credential = credential;
		this.timeout = timeout;
	}

	get baseUrl(): string {
		return this.credential.baseUrl;
	}

	buildUrl(path: string, params?: QueryParams): string {
		const url = new URL(path, this.credential.baseUrl);
		for (const [key, value] of Object.entries(params ?? {})) {
			if (value !== undefined) url.searchParams.set(key, String(value));
		}
		return url.toString();
	}

	async send(req: HttpRequest): Promise<Response> {
		const url = this.buildUrl(req.path, req.params);
		try {
			return await fetch(url, {
				method: req.method,
				headers: req.headers,
				body: req.body,
				dispatcher: this.getAgent(),
				signal: AbortSignal.timeout(this.timeout),
			});
		} catch (err) {
			throw toTransportError(err, `${req.method} ${req.path}`);
		}
	}

	/** Tear down the connection pool; in-flight requests fail. A later send reconnects. */
	async close(): Promise<void> {
		const agent = this.agent;
		this.agent = null;
		if (agent) {
			await agent.destroy();
		}
	}

	private getAgent(): Agent {
		if (!this.agent) {
			this.agent = new Agent({
				connections: 1,
				connect: { rejectUnauthorized: this.credential.verifyTls },
			});
		}
		return this.agent;
	}
}

/** Map a fetch/socket failure to a TransportError carrying the system error code. */
export function toTransportError(err: unknown, what: string): TransportError {
	if (err instanceof TransportError) return err;

	if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
		return new TransportError(`${what} timed out`, "timeout", { cause: err });
	}

	const cause = err instanceof Error ? err.cause : undefined;
	const code =
		cause instanceof Error && "code" in cause && typeof cause.code === "string"
			? cause.code
			: "connection_failed";
	let detail = String(err);
	if (cause instanceof Error) detail = cause.message;
	else if (err instanceof Error) detail = err.message;
	return new TransportError(`${what} failed: ${detail}`, code, { cause: err });
}
