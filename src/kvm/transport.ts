// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Request/response calls against the device REST API.
 *
 * JSON endpoints answer with `{"ok": bool, "result": ...}`. Failures carry
 * `result.error` (an error class name such as "MsdUnknownImageError") and
 * `result.error_msg`. Nothing here retries; retry policy belongs to the caller.
 */

import type { BodyInit, Response } from "undici";
import { z } from "zod/v4";
import { ApiError, AuthError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { HttpConnection, QueryParams } from "./http.js";
import { type SessionAuthenticator, sessionCookie } from "./session.js";
import type { JsonObject } from "./types.js";

const envelopeSchema = z.object({
	ok: z.boolean(),
	result: z.unknown().optional(),
});

const errorResultSchema = z.looseObject({
	error: z.string().optional(),
	error_msg: z.string().optional(),
});

export interface PostOptions {
	readonly body?: BodyInit;
	readonly contentType?: string;
}

export class RequestTransport {
	private readonly http: HttpConnection;
	private readonly session: SessionAuthenticator;
	private readonly log: Logger;

	constructor(http: HttpConnection, session: SessionAuthenticator, logger: Logger) {
		this.http = http;
		this.session = session;
		this.log = logger.child({ component: "transport" });
	}

	async get(path: string, params?: QueryParams): Promise<JsonObject> {
		const res = await this.request("GET", path, params);
		return this.readResult(res, `GET ${path}`);
	}

	async post(path: string, params?: QueryParams, options: PostOptions = {}): Promise<JsonObject> {
		const res = await this.request("POST", path, params, options);
		return this.readResult(res, `POST ${path}`);
	}

	/** GET a binary payload (e.g. a JPEG snapshot). The bytes are returned as-is. */
	async getBytes(path: string, params?: QueryParams): Promise<Buffer> {
		const res = await this.request("GET", path, params);
		if (!res.ok) {
			throw parseApiError(await res.text(), res.status);
		}
		return Buffer.from(await res.arrayBuffer());
	}

	private async request(
		method: "GET" | "POST",
		path: string,
		params?: QueryParams,
		options: PostOptions = {},
	): Promise<Response> {
		const session = await this.session.ensureSession();

		const headers: Record<string, string> = { Cookie: sessionCookie(session) };
		if (options.contentType) {
			headers["Content-Type"] = options.contentType;
		}

		this.log.debug({ method, path }, "request");
		const res = await this.http.send({ method, path, params, headers, body: options.body });

		if (res.status === 401 || res.status === 403) {
			// Drain so the pooled connection is released
			await res.text();
			this.session.invalidate(session);
			throw new AuthError(
				`${method} ${path}: ${res.status === 401 ? "authentication required" : "forbidden"}`,
				res.status === 401 ? "unauthorized" : "forbidden",
			);
		}
		return res;
	}

	private async readResult(res: Response, what: string): Promise<JsonObject> {
		const text = await res.text();
		if (!res.ok) {
			throw parseApiError(text, res.status);
		}

		let json: unknown;
		try {
			json = JSON.parse(text);
		} catch (err) {
			throw new ApiError("InvalidResponse", `${what} returned non-JSON body`, { cause: err });
		}

		const envelope = envelopeSchema.safeParse(json);
		if (!envelope.success) {
			throw new ApiError("InvalidResponse", `${what} returned an unexpected body`);
		}
		if (!envelope.data.ok) {
			throw parseApiError(text, res.status);
		}

		const result = envelope.data.result;
		return isJsonObject(result) ? result : {};
	}
}

/** Build an ApiError from an error response body, falling back to the HTTP status. */
export function parseApiError(text: string, status: number): ApiError {
	let json: unknown;
	try {
		json = JSON.parse(text);
	} catch {
		json = undefined;
	}

	const envelope = envelopeSchema.safeParse(json);
	if (envelope.success) {
		const result = errorResultSchema.safeParse(envelope.data.result);
		const detail: z.infer<typeof errorResultSchema> = result.success ? result.data : {};
		return new ApiError(detail.error ?? "UnknownError", detail.error_msg ?? "Unknown error");
	}
	return new ApiError(`HTTP_${status}`, text.slice(0, 200) || `HTTP ${status}`);
}

function isJsonObject(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
