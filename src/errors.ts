// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Error taxonomy shared by both client flavours.
 *
 * Every failure carries a `category` and a `code` so callers can branch on
 * them without string-matching messages. The blocking client moves errors
 * across a worker boundary as {@link SerializedKvmError} and revives them
 * into the same classes.
 */

export type ErrorCategory = "auth" | "api" | "transport" | "keymap" | "config";

export class KvmError extends Error {
	override readonly name: string = "KvmError";
	readonly category: ErrorCategory;
	readonly code: string;

	constructor(category: ErrorCategory, code: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.category = category;
		this.code = code;
	}
}

/** Credentials were rejected, or the session was invalidated mid-use. */
export class AuthError extends KvmError {
	override readonly name = "AuthError";

	constructor(message: string, code = "unauthorized", options?: ErrorOptions) {
		super("auth", code, message, options);
	}
}

/** The device accepted the request but reported a semantic failure. */
export class ApiError extends KvmError {
	override readonly name = "ApiError";

	constructor(code: string, message: string, options?: ErrorOptions) {
		super("api", code, `${code}: ${message}`, options);
	}
}

/** The connection could not be established or was lost. */
export class TransportError extends KvmError {
	override readonly name = "TransportError";

	constructor(message: string, code = "connection_failed", options?: ErrorOptions) {
		super("transport", code, message, options);
	}
}

export class UnknownKeyError extends KvmError {
	override readonly name = "UnknownKeyError";
	readonly key: string;

	constructor(key: string) {
		super("keymap", "unknown_key", `Unknown key name: ${JSON.stringify(key)}`);
		this.key = key;
	}
}

export class UnsupportedCharacterError extends KvmError {
	override readonly name = "UnsupportedCharacterError";
	readonly character: string;

	constructor(character: string) {
		const codePoint = character.codePointAt(0) ?? 0;
		super(
			"keymap",
			"unsupported_character",
			`Cannot type character U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`,
		);
		this.character = character;
	}
}

export class ConfigError extends KvmError {
	override readonly name = "ConfigError";

	constructor(message: string) {
		super("config", "invalid_config", message);
	}
}

/** Plain-data form of a {@link KvmError}, safe for structured clone. */
export interface SerializedKvmError {
	readonly name: string;
	readonly category: ErrorCategory | "internal";
	readonly code: string;
	readonly message: string;
	readonly detail?: string;
}

export function serializeError(err: unknown): SerializedKvmError {
	if (err instanceof UnknownKeyError) {
		return {
			name: err.name,
			category: err.category,
			code: err.code,
			message: err.message,
			detail: err.key,
		};
	}
	if (err instanceof UnsupportedCharacterError) {
		return {
			name: err.name,
			category: err.category,
			code: err.code,
			message: err.message,
			detail: err.character,
		};
	}
	if (err instanceof KvmError) {
		return { name: err.name, category: err.category, code: err.code, message: err.message };
	}
	const message = err instanceof Error ? err.message : String(err);
	return { name: "Error", category: "internal", code: "internal", message };
}

/** Rebuild the error class a {@link SerializedKvmError} was taken from. */
export function reviveError(data: SerializedKvmError): Error {
	switch (data.name) {
		case "AuthError":
			return new AuthError(data.message, data.code);
		case "ApiError": {
			// ApiError prefixes the code itself
			const prefix = `${data.code}: `;
			const message = data.message.startsWith(prefix)
				? data.message.slice(prefix.length)
				: data.message;
			return new ApiError(data.code, message);
		}
		case "TransportError":
			return new TransportError(data.message, data.code);
		case "UnknownKeyError":
			return new UnknownKeyError(data.detail ?? "");
		case "UnsupportedCharacterError":
			return new UnsupportedCharacterError(data.detail ?? "");
		case "ConfigError":
			return new ConfigError(data.message);
		default:
			if (data.category === "internal") return new Error(data.message);
			return new KvmError(data.category, data.code, data.message);
	}
}
