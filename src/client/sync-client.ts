// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Blocking client. Each call runs the matching {@link AsyncKvmClient}
 * operation in a worker thread and blocks the calling thread until it
 * settles, so ordering, wire traffic and errors match the Promise-based
 * client exactly.
 *
 * Notifications are only available on the Promise-based client.
 */

import { fileURLToPath } from "node:url";
import { createSyncFn } from "synckit";
import type { AtxButton } from "../api/atx.js";
import type { MsdImages } from "../api/msd.js";
import { resolveClientConfig } from "../config.js";
import { reviveError } from "../errors.js";
import type { MouseButton } from "../kvm/protocol.js";
import type { ChannelState, ClientConfig, JsonObject, KvmClientOptions } from "../kvm/types.js";
import type { OperationArgs, OperationName, OperationResults } from "./operations.js";
import type { WorkerClientOptions, WorkerRequest, handle } from "./sync-worker.js";

type Invoke = <K extends OperationName>(name: K, ...args: OperationArgs[K]) => OperationResults[K];

type SyncCall = (request: WorkerRequest) => Awaited<ReturnType<typeof handle>>;

let syncCall: SyncCall | null = null;

/** One worker per process, started on first use. It does not keep the process alive. */
function worker(): SyncCall {
	if (!syncCall) {
		const file = import.meta.url.endsWith(".ts") ? "./sync-worker.ts" : "./sync-worker.js";
		syncCall = createSyncFn<typeof handle>(fileURLToPath(new URL(file, import.meta.url)), {
			tsRunner: "tsx",
		});
	}
	return syncCall;
}

export class SyncKeyboard {
	private readonly invoke: Invoke;

	constructor(invoke: Invoke) {
		this.invoke = invoke;
	}

	press(key: string): void {
		this.invoke("keyboard.press", key);
	}

	hold(key: string): void {
		this.invoke("keyboard.hold", key);
	}

	release(key: string): void {
		this.invoke("keyboard.release", key);
	}

	shortcut(...keys: string[]): void {
		this.invoke("keyboard.shortcut", ...keys);
	}

	type(text: string): void {
		this.invoke("keyboard.type", text);
	}

	print(text: string, keymap?: string): void {
		this.invoke("keyboard.print", text, keymap);
	}
}

export class SyncMouse {
	private readonly invoke: Invoke;

	constructor(invoke: Invoke) {
		this.invoke = invoke;
	}

	move(x: number, y: number): void {
		this.invoke("mouse.move", x, y);
	}

	click(x?: number, y?: number, button?: MouseButton): void {
		this.invoke("mouse.click", x, y, button);
	}

	rightClick(x?: number, y?: number): void {
		this.invoke("mouse.rightClick", x, y);
	}

	middleClick(x?: number, y?: number): void {
		this.invoke("mouse.middleClick", x, y);
	}

	doubleClick(x?: number, y?: number, button?: MouseButton): void {
		this.invoke("mouse.doubleClick", x, y, button);
	}

	drag(
		x1: number,
		y1: number,
		x2: number,
		y2: number,
		button?: MouseButton,
		steps?: number,
	): void {
		this.invoke("mouse.drag", x1, y1, x2, y2, button, steps);
	}

	scroll(dx?: number, dy?: number): void {
		this.invoke("mouse.scroll", dx, dy);
	}

	relativeMove(dx: number, dy: number): void {
		this.invoke("mouse.relativeMove", dx, dy);
	}
}

export class SyncVideo {
	private readonly invoke: Invoke;

	constructor(invoke: Invoke) {
		this.invoke = invoke;
	}

	screenshot(): Buffer {
		const bytes = this.invoke("video.screenshot");
		return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	}

	streamerInfo(): JsonObject {
		return this.invoke("video.streamerInfo");
	}
}

export class SyncMsd {
	private readonly invoke: Invoke;

	constructor(invoke: Invoke) {
		this.invoke = invoke;
	}

	status(): JsonObject {
		return this.invoke("msd.status");
	}

	listImages(): MsdImages {
		return this.invoke("msd.listImages");
	}

	upload(data: Uint8Array, imageName: string): JsonObject {
		return this.invoke("msd.upload", data, imageName);
	}

	uploadUrl(url: string, imageName?: string): JsonObject {
		return this.invoke("msd.uploadUrl", url, imageName);
	}

	setImage(imageName: string, cdrom?: boolean): JsonObject {
		return this.invoke("msd.setImage", imageName, cdrom);
	}

	connect(): JsonObject {
		return this.invoke("msd.connect");
	}

	disconnect(): JsonObject {
		return this.invoke("msd.disconnect");
	}

	removeImage(imageName: string): JsonObject {
		return this.invoke("msd.removeImage", imageName);
	}
}

export class SyncAtx {
	private readonly invoke: Invoke;

	constructor(invoke: Invoke) {
		this.invoke = invoke;
	}

	status(): JsonObject {
		return this.invoke("atx.status");
	}

	shortPress(): JsonObject {
		return this.invoke("atx.shortPress");
	}

	longPress(): JsonObject {
		return this.invoke("atx.longPress");
	}

	reset(): JsonObject {
		return this.invoke("atx.reset");
	}

	click(button: AtxButton): JsonObject {
		return this.invoke("atx.click", button);
	}
}

export class KvmClient {
	private static nextId = 1;

	readonly config: ClientConfig;
	readonly keyboard: SyncKeyboard;
	readonly mouse: SyncMouse;
	readonly video: SyncVideo;
	readonly msd: SyncMsd;
	readonly atx: SyncAtx;

	private readonly id = KvmClient.nextId++;
	private readonly workerOptions: WorkerClientOptions;
	private opened = false;

	/**
	 * Options are resolved here, so a ConfigError is thrown by the
	 * constructor. A `logger` option is not carried into the worker, which
	 * logs through the default logger.
	 */
	constructor(options: KvmClientOptions = {}) {
		this.config = resolveClientConfig(options);
		const { credential, connectTimeout, handshakeTimeout, requestTimeout, timing } = this.config;
		this.workerOptions = {
			host: credential.baseUrl,
			username: credential.username,
			password: credential.password,
			verifyTls: credential.verifyTls,
			connectTimeout,
			handshakeTimeout,
			requestTimeout,
			timing,
		};

		const invoke: Invoke = (name, ...args) => this.call(name, args);
		this.keyboard = new SyncKeyboard(invoke);
		this.mouse = new SyncMouse(invoke);
		this.video = new SyncVideo(invoke);
		this.msd = new SyncMsd(invoke);
		this.atx = new SyncAtx(invoke);
	}

	/** Run `fn` with a fresh client and close it on every exit path. */
	static use<T>(options: KvmClientOptions, fn: (client: KvmClient) => T): T {
		const client = new KvmClient(options);
		try {
			return fn(client);
		} finally {
			client.close();
		}
	}

	get channelState(): ChannelState {
		return this.opened ? this.call("channelState", []) : "CLOSED";
	}

	info(): JsonObject {
		return this.call("info", []);
	}

	streamerInfo(): JsonObject {
		return this.call("streamerInfo", []);
	}

	connect(): void {
		this.call("connect", []);
	}

	/** Tear down the channel and session. Safe to call twice; a later call reconnects. */
	close(): void {
		if (!this.opened) return;
		this.opened = false;
		this.request({ kind: "close", clientId: this.id });
	}

	private call<K extends OperationName>(name: K, args: OperationArgs[K]): OperationResults[K] {
		if (!this.opened) {
			this.request({ kind: "open", clientId: this.id, options: this.workerOptions });
			this.opened = true;
		}
		const value = this.request({ kind: "call", clientId: this.id, name, args });
		return value as OperationResults[K];
	}

	private request(request: WorkerRequest): OperationResults[OperationName] | undefined {
		const response = worker()(request);
		if (!response.ok) {
			throw reviveError(response.error);
		}
		return response.value;
	}
}
