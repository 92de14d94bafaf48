// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Promise-based client. Owns one session, one HTTP agent and one event
 * channel; all of them are created lazily on first use.
 */

import { Atx } from "../api/atx.js";
import { Msd } from "../api/msd.js";
import { Video } from "../api/video.js";
import { resolveClientConfig } from "../config.js";
import { Keyboard } from "../hid/keyboard.js";
import { Mouse } from "../hid/mouse.js";
import { EventChannel } from "../kvm/event-channel.js";
import { HttpConnection } from "../kvm/http.js";
import { SessionAuthenticator } from "../kvm/session.js";
import { RequestTransport } from "../kvm/transport.js";
import type {
	ChannelState,
	ClientConfig,
	JsonObject,
	KvmClientOptions,
	NotificationListener,
} from "../kvm/types.js";
import { type Logger, createLogger } from "../logger.js";

export class AsyncKvmClient {
	readonly config: ClientConfig;
	readonly keyboard: Keyboard;
	readonly mouse: Mouse;
	readonly video: Video;
	readonly msd: Msd;
	readonly atx: Atx;

	private readonly http: HttpConnection;
	private readonly session: SessionAuthenticator;
	private readonly transport: RequestTransport;
	private readonly channel: EventChannel;
	private readonly log: Logger;

	constructor(options: KvmClientOptions = {}) {
		this.config = resolveClientConfig(options);
		this.log = options.logger ?? createLogger();

		const { credential } = this.config;
		this.http = new HttpConnection(credential, this.config.requestTimeout);
		this.session = new SessionAuthenticator(credential, this.http, this.log);
		this.transport = new RequestTransport(this.http, this.session, this.log);
		this.channel = new EventChannel(
			credential,
			this.session,
			{
				connectTimeout: this.config.connectTimeout,
				handshakeTimeout: this.config.handshakeTimeout,
			},
			this.log,
		);

		this.keyboard = new Keyboard(this.channel, this.transport, this.config.timing, this.log);
		this.mouse = new Mouse(this.channel, this.config.timing);
		this.video = new Video(this.transport);
		this.msd = new Msd(this.transport);
		this.atx = new Atx(this.transport);
	}

	get baseUrl(): string {
		return this.config.credential.baseUrl;
	}

	get channelState(): ChannelState {
		return this.channel.state;
	}

	/** Device information: hardware, firmware, hostname. */
	async info(): Promise<JsonObject> {
		return this.transport.get("/api/info");
	}

	async streamerInfo(): Promise<JsonObject> {
		return this.video.streamerInfo();
	}

	/** Open the event channel ahead of the first input operation. */
	async connect(): Promise<void> {
		await this.channel.open();
	}

	/** Device state messages pushed over the event channel. Returns an unsubscribe function. */
	subscribe(listener: NotificationListener): () => void {
		return this.channel.subscribe(listener);
	}

	/**
	 * Tear down the channel and forget the session. Sends waiting on the
	 * socket fail with TransportError. Safe to call twice; using the client
	 * again reconnects.
	 */
	async close(): Promise<void> {
		this.channel.close();
		this.session.destroy();
		await this.http.close();
	}
}

/** Run `fn` with a fresh client and close it on every exit path. */
export async function withKvmClient<T>(
	options: KvmClientOptions,
	fn: (client: AsyncKvmClient) => Promise<T>,
): Promise<T> {
	const client = new AsyncKvmClient(options);
	try {
		return await fn(client);
	} finally {
		await client.close();
	}
}
