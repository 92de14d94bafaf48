// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Construction-time option resolution: explicit options win, then KVM_*
 * environment variables, then defaults.
 */

import { z } from "zod/v4";
import { ConfigError } from "./errors.js";
import type { ClientConfig, GestureTiming, KvmClientOptions } from "./kvm/types.js";

export const ENV = {
	host: "KVM_HOST",
	username: "KVM_USERNAME",
	password: "KVM_PASSWORD",
	verifyTls: "KVM_VERIFY_TLS",
} as const;

const DEFAULT_USERNAME = "admin";
const DEFAULT_CONNECT_TIMEOUT = 10_000;
const DEFAULT_HANDSHAKE_TIMEOUT = 10_000;
const DEFAULT_REQUEST_TIMEOUT = 30_000;

export const DEFAULT_TIMING: GestureTiming = {
	keyDelay: 20,
	shortcutPause: 50,
	clickDelay: 50,
	doubleClickGap: 100,
};

const timeout = z.number().int().positive();
const delay = z.number().int().nonnegative();

const optionsSchema = z.object({
	host: z.string().trim().min(1, "host is required (pass `host` or set KVM_HOST)"),
	username: z.string().min(1),
	password: z.string(),
	verifyTls: z.boolean(),
	connectTimeout: timeout,
	handshakeTimeout: timeout,
	requestTimeout: timeout,
	timing: z.object({
		keyDelay: delay,
		shortcutPause: delay,
		clickDelay: delay,
		doubleClickGap: delay,
	}),
});

/** Parse a boolean-ish environment value ("1", "true", "yes", "on"). */
export function parseBooleanEnv(value: string | undefined): boolean | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

/**
 * Normalize a host option into an origin. Bare hosts get https; an explicit
 * http:// or https:// scheme is kept. Trailing slashes are dropped.
 */
export function toBaseUrl(host: string): string {
	const trimmed = host.trim().replace(/\/+$/, "");
	const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

	let url: URL;
	try {
		url = new URL(withScheme);
	} catch {
		throw new ConfigError(`Invalid host: ${JSON.stringify(host)}`);
	}
	return url.origin;
}

export function resolveClientConfig(
	options: KvmClientOptions = {},
	env: NodeJS.ProcessEnv = process.env,
): ClientConfig {
	const parsed = optionsSchema.safeParse({
		host: options.host ?? env[ENV.host] ?? "",
		username: options.username ?? env[ENV.username] ?? DEFAULT_USERNAME,
		password: options.password ?? env[ENV.password] ?? "",
		verifyTls: options.verifyTls ?? parseBooleanEnv(env[ENV.verifyTls]) ?? false,
		connectTimeout: options.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT,
		handshakeTimeout: options.handshakeTimeout ?? DEFAULT_HANDSHAKE_TIMEOUT,
		requestTimeout: options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT,
		timing: { ...DEFAULT_TIMING, ...options.timing },
	});

	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid client options: ${issues}`);
	}

	const { host, username, password, verifyTls, ...rest } = parsed.data;
	return {
		credential: { baseUrl: toBaseUrl(host), username, password, verifyTls },
		...rest,
	};
}
