// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Types for the PiKVM-compatible HTTP API and HID WebSocket.
 */

import type { Logger } from "../logger.js";

/** Resolved connection credentials. Immutable once the client is built. */
export interface Credential {
	/** Origin of the device, e.g. "https://kvm.local" */
	readonly baseUrl: string;
	readonly username: string;
	readonly password: string;
	/** Verify the device's TLS certificate (devices usually ship self-signed ones) */
	readonly verifyTls: boolean;
}

/** Authenticated session, reused for REST calls and the event channel handshake. */
export interface Session {
	readonly token: string;
	readonly createdAt: number;
}

/** Pauses inserted between primitive events, in ms. Zero disables a pause. */
export interface GestureTiming {
	/** Between a key press and its release (default: 20) */
	readonly keyDelay: number;
	/** Between the last press and first release of a shortcut (default: 50) */
	readonly shortcutPause: number;
	/** Between the move, press and release of a click (default: 50) */
	readonly clickDelay: number;
	/** Between the two clicks of a double click (default: 100) */
	readonly doubleClickGap: number;
}

export interface KvmClientOptions {
	/** Host name, or a URL with explicit scheme. Falls back to KVM_HOST. */
	readonly host?: string;
	/** Falls back to KVM_USERNAME, then "admin". */
	readonly username?: string;
	/** Falls back to KVM_PASSWORD, then "". */
	readonly password?: string;
	/** Falls back to KVM_VERIFY_TLS, then false. */
	readonly verifyTls?: boolean;
	/** WebSocket connection timeout in ms (default: 10000) */
	readonly connectTimeout?: number;
	/** Time allowed for the device's initial state burst in ms (default: 10000) */
	readonly handshakeTimeout?: number;
	/** HTTP request timeout in ms (default: 30000) */
	readonly requestTimeout?: number;
	readonly timing?: Partial<GestureTiming>;
	readonly logger?: Logger;
}

/** Fully resolved client configuration. */
export interface ClientConfig {
	readonly credential: Credential;
	readonly connectTimeout: number;
	readonly handshakeTimeout: number;
	readonly requestTimeout: number;
	readonly timing: GestureTiming;
}

export type JsonObject = Record<string, unknown>;

/** Response envelope used by every JSON endpoint of the device. */
export interface ApiEnvelope {
	readonly ok: boolean;
	readonly result?: unknown;
}

export type ChannelState = "CLOSED" | "CONNECTING" | "OPEN";

/** Asynchronous state message pushed by the device over the event channel. */
export interface DeviceNotification {
	readonly eventType: string;
	readonly event: unknown;
}

export type NotificationListener = (notification: DeviceNotification) => void;
