// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

import { type Logger, pino } from "pino";

export type { Logger } from "pino";

/**
 * Create the library's default logger. Level comes from LOG_LEVEL (default "info").
 * Components log through `logger.child({ component })`.
 */
export function createLogger(name = "kvmlink"): Logger {
	return pino({
		name,
		level: process.env.LOG_LEVEL ?? "info",
		redact: ["password", "token", "*.password", "*.token"],
	});
}
