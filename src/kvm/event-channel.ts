// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Persistent HID event channel over the device WebSocket (/api/ws).
 *
 * Lifecycle: CLOSED → CONNECTING → OPEN → CLOSED. Connecting means:
 * 1. Ensure a REST session (the token doubles as the WebSocket credential)
 * 2. Upgrade with `Cookie: auth_token=<token>`; 401/403 here is an AuthError
 * 3. Wait for the device's initial state burst to end ("loop" or "streamer")
 *
 * Sends go out one JSON frame per event, in the order they were issued, and
 * resolve once the frame is handed to the socket. The device sends no
 * per-event acknowledgement. Whatever it does send is published to
 * subscribers as notifications.
 */

import WebSocket from "ws";
import { AuthError, TransportError } from "../errors.js";
import type { Logger } from "../logger.js";
import { toTransportError } from "./http.js";
import { Mutex } from "./mutex.js";
import {
	HANDSHAKE_MARKERS,
	type HidEvent,
	WS_PATH,
	encodeEvent,
	parseDeviceMessage,
} from "./protocol.js";
import { type SessionAuthenticator, sessionCookie } from "./session.js";
import type {
	ChannelState,
	Credential,
	DeviceNotification,
	NotificationListener,
	Session,
} from "./types.js";

export interface EventChannelOptions {
	readonly connectTimeout: number;
	readonly handshakeTimeout: number;
}

/** Writes one event; only valid inside {@link EventSink.exclusive}. */
export type EventWriter = (event: HidEvent) => Promise<void>;

/** Where composed gestures go. Implemented by the event channel and by test doubles. */
export interface EventSink {
	/**
	 * Run `fn` while holding the write lock. Events written through the
	 * writer are never interleaved with another caller's events.
	 */
	exclusive<T>(fn: (write: EventWriter) => Promise<T>): Promise<T>;
}

export class EventChannel implements EventSink {
	private ws: WebSocket | null = null;
	private channelState: ChannelState = "CLOSED";
	private connecting: Promise<WebSocket> | null = null;
	private generation = 0;
	private opened = 0;
	private readonly writeLock = new Mutex();
	private readonly inflight = new Set<(err: Error) => void>();
	private readonly listeners = new Set<NotificationListener>();
	private readonly credential: Credential;
	private readonly session: SessionAuthenticator;
	private readonly options: EventChannelOptions;
	private readonly log: Logger;

	constructor(
		credential: Credential,
		session: SessionAuthenticator,
		options: EventChannelOptions,
		logger: Logger,
	) {
		this.credential = credential;
		this.session = session;
		this.options = options;
		this.log = logger.child({ component: "event-channel" });
	}

	get state(): ChannelState {
		return this.channelState;
	}

	/** Number of handles opened over the channel's lifetime. */
	get connectionCount(): number {
		return this.opened;
	}

	get url(): string {
		const wsProto = this.credential.baseUrl.startsWith("https") ? "wss" : "ws";
		return `${wsProto}://${new URL(this.credential.baseUrl).host}${WS_PATH}`;
	}

	/** Open the channel, or return the live handle. Concurrent callers share one attempt. */
	async open(): Promise<void> {
		await this.ensureOpen();
	}

	async send(event: HidEvent): Promise<void> {
		await this.exclusive((write) => write(event));
	}

	/**
	 * A section belongs to the channel generation it was started in. Once
	 * {@link close} ends that generation, its writes fail with TransportError
	 * instead of reconnecting; only a section started later reconnects.
	 */
	async exclusive<T>(fn: (write: EventWriter) => Promise<T>): Promise<T> {
		const generation = this.generation;
		return this.writeLock.runExclusive(() => fn((event) => this.write(event, generation)));
	}

	/** Receive device notifications. Returns an unsubscribe function. */
	subscribe(listener: NotificationListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Tear the channel down now. Sends waiting on the socket, and sections
	 * started before the close, fail with TransportError; the next section
	 * reconnects with a fresh handshake.
	 */
	close(): void {
		this.generation++;
		const ws = this.ws;
		this.ws = null;
		this.connecting = null;
		this.channelState = "CLOSED";
		this.failInflight(new TransportError("Event channel closed", "closed"));
		if (ws) {
			this.log.info("event channel closed");
			ws.terminate();
		}
	}

	private async write(event: HidEvent, generation: number): Promise<void> {
		this.assertGeneration(generation);
		const ws = await this.ensureOpen();
		this.assertGeneration(generation);
		const data = encodeEvent(event);

		await new Promise<void>((resolve, reject) => {
			const fail = (err: Error): void => {
				this.inflight.delete(fail);
				reject(err);
			};
			this.inflight.add(fail);

			ws.send(data, (err) => {
				if (!this.inflight.delete(fail)) return;
				if (err) {
					const error = toTransportError(err, "event send");
					this.dropHandle(ws, error);
					reject(error);
				} else {
					resolve();
				}
			});
		});
		this.log.debug({ event }, "event sent");
	}

	private assertGeneration(generation: number): void {
		if (generation !== this.generation) {
			throw new TransportError("Event channel closed", "closed");
		}
	}

	private ensureOpen(): Promise<WebSocket> {
		if (this.ws && this.channelState === "OPEN") {
			return Promise.resolve(this.ws);
		}
		if (!this.connecting) {
			const attempt = this.establish();
			this.connecting = attempt;
			const clear = (): void => {
				if (this.connecting === attempt) this.connecting = null;
			};
			attempt.then(clear, clear);
		}
		return this.connecting;
	}

	private async establish(): Promise<WebSocket> {
		const generation = this.generation;
		this.channelState = "CONNECTING";

		try {
			const session = await this.session.ensureSession();
			const ws = await this.connect(session, generation);

			if (generation !== this.generation) {
				ws.terminate();
				throw new TransportError("Event channel closed while connecting", "closed");
			}

			this.ws = ws;
			this.channelState = "OPEN";
			this.opened++;
			this.log.info({ url: this.url }, "event channel open");
			return ws;
		} catch (err) {
			if (generation === this.generation) {
				this.channelState = "CLOSED";
			}
			throw err;
		}
	}

	private connect(session: Session, generation: number): Promise<WebSocket> {
		const { connectTimeout, handshakeTimeout } = this.options;

		return new Promise<WebSocket>((resolve, reject) => {
			let settled = false;
			let handshakeTimer: NodeJS.Timeout | undefined;

			const ws = new WebSocket(this.url, {
				headers: {
					Cookie: sessionCookie(session),
					Origin: this.credential.baseUrl,
				},
				rejectUnauthorized: this.credential.verifyTls,
			});

			const finish = (err: Error | null): void => {
				if (settled) return;
				settled = true;
				clearTimeout(connectTimer);
				clearTimeout(handshakeTimer);
				if (err) {
					ws.terminate();
					reject(err);
				} else {
					resolve(ws);
				}
			};

			const connectTimer = setTimeout(() => {
				finish(
					new TransportError(
						`Event channel connect timed out after ${connectTimeout}ms`,
						"timeout",
					),
				);
			}, connectTimeout);

			ws.on("unexpected-response", (_req, res) => {
				const status = res.statusCode ?? 0;
				res.resume();
				if (status === 401 || status === 403) {
					this.session.invalidate(session);
					finish(new AuthError(`Event channel upgrade rejected: HTTP ${status}`));
				} else {
					finish(
						new TransportError(`Event channel upgrade failed: HTTP ${status}`, `HTTP_${status}`),
					);
				}
			});

			ws.on("open", () => {
				clearTimeout(connectTimer);
				handshakeTimer = setTimeout(() => {
					finish(
						new TransportError(
							`Device sent no initial state within ${handshakeTimeout}ms`,
							"handshake_timeout",
						),
					);
				}, handshakeTimeout);
			});

			ws.on("message", (data, isBinary) => {
				if (isBinary) return;
				const message = parseDeviceMessage(data.toString());
				if (!message) return;

				if (!settled && HANDSHAKE_MARKERS.has(message.eventType)) {
					finish(null);
				}
				this.publish({ eventType: message.eventType, event: message.event });
			});

			ws.on("error", (err) => {
				if (!settled) {
					finish(toTransportError(err, "event channel connect"));
					return;
				}
				this.log.warn({ err }, "event channel error");
			});

			ws.on("close", (code) => {
				if (!settled) {
					finish(
						new TransportError(`Event channel closed during handshake (code: ${code})`, "closed"),
					);
					return;
				}
				if (generation === this.generation) {
					this.dropHandle(ws, new TransportError(`Event channel lost (code: ${code})`, "closed"));
				}
			});
		});
	}

	/** Forget a dead handle so the next send reconnects. */
	private dropHandle(ws: WebSocket, err: TransportError): void {
		if (this.ws !== ws) return;
		this.ws = null;
		this.channelState = "CLOSED";
		this.failInflight(err);
		ws.terminate();
		this.log.warn({ code: err.code }, "event channel dropped");
	}

	private failInflight(err: Error): void {
		const pending = [...this.inflight];
		this.inflight.clear();
		for (const fail of pending) fail(err);
	}

	private publish(notification: DeviceNotification): void {
		for (const listener of this.listeners) {
			try {
				listener(notification);
			} catch (err) {
				this.log.warn(
					{ err, eventType: notification.eventType },
					"notification listener threw",
				);
			}
		}
	}
}
