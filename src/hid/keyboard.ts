// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Keyboard gestures composed into ordered key events.
 *
 * Key names and characters are resolved before anything is written, so a
 * lookup failure never leaves a half-sent gesture on the wire. Each gesture
 * holds the channel's write lock for its whole sequence.
 */

import type { EventSink, EventWriter } from "../kvm/event-channel.js";
import { keyEvent } from "../kvm/protocol.js";
import type { RequestTransport } from "../kvm/transport.js";
import type { GestureTiming } from "../kvm/types.js";
import type { Logger } from "../logger.js";
import { SHIFT_KEY, resolve, translateText } from "./keymap.js";
import { sleep } from "./timing.js";

export class Keyboard {
	private readonly sink: EventSink;
	private readonly transport: RequestTransport;
	private readonly timing: GestureTiming;
	private readonly log: Logger;

	constructor(
		sink: EventSink,
		transport: RequestTransport,
		timing: GestureTiming,
		logger: Logger,
	) {
		this.sink = sink;
		this.transport = transport;
		this.timing = timing;
		this.log = logger.child({ component: "keyboard" });
	}

	/** Press and release a single key, e.g. "Enter", "KeyA", "ControlLeft". */
	async press(key: string): Promise<void> {
		resolve(key);
		await this.sink.exclusive((write) => this.tap(write, key));
	}

	/** Press a key and leave it down until {@link release}. */
	async hold(key: string): Promise<void> {
		resolve(key);
		await this.sink.exclusive((write) => write(keyEvent(key, true)));
	}

	async release(key: string): Promise<void> {
		resolve(key);
		await this.sink.exclusive((write) => write(keyEvent(key, false)));
	}

	/**
	 * Press `keys` in order, then release them in reverse. If a write fails
	 * partway, every key already pressed is released before the error
	 * propagates.
	 */
	async shortcut(...keys: string[]): Promise<void> {
		for (const key of keys) resolve(key);

		await this.sink.exclusive(async (write) => {
			const pressed: string[] = [];
			try {
				for (const key of keys) {
					await write(keyEvent(key, true));
					pressed.push(key);
					await sleep(this.timing.keyDelay);
				}
				await sleep(this.timing.shortcutPause);
			} catch (err) {
				await this.releaseAll(write, pressed);
				throw err;
			}

			// Releases are tracked too, so a failure here still balances the rest
			while (pressed.length > 0) {
				const key = pressed[pressed.length - 1];
				try {
					await write(keyEvent(key, false));
				} catch (err) {
					pressed.pop();
					await this.releaseAll(write, pressed);
					throw err;
				}
				pressed.pop();
				await sleep(this.timing.keyDelay);
			}
		});
	}

	/**
	 * Type literal text key by key. Only printable ASCII is accepted; control
	 * characters such as "\n" are rejected rather than mapped to keys.
	 */
	async type(text: string): Promise<void> {
		const strokes = translateText(text);

		await this.sink.exclusive(async (write) => {
			for (const stroke of strokes) {
				if (stroke.shift) {
					await write(keyEvent(SHIFT_KEY, true));
					await this.tap(write, stroke.key);
					await write(keyEvent(SHIFT_KEY, false));
				} else {
					await this.tap(write, stroke.key);
				}
			}
		});
	}

	/**
	 * Let the device type the text itself through its HID print endpoint.
	 * Faster for long text; the device's keymap decides how characters map.
	 */
	async print(text: string, keymap = "en-us"): Promise<void> {
		await this.transport.post(
			"/api/hid/print",
			{ limit: 0, keymap },
			{ body: text, contentType: "text/plain; charset=utf-8" },
		);
	}

	private async tap(write: EventWriter, key: string): Promise<void> {
		await write(keyEvent(key, true));
		await sleep(this.timing.keyDelay);
		await write(keyEvent(key, false));
	}

	/** Best-effort release in reverse order; failures are logged, the original error wins. */
	private async releaseAll(write: EventWriter, pressed: string[]): Promise<void> {
		for (const key of [...pressed].reverse()) {
			try {
				await write(keyEvent(key, false));
			} catch (err) {
				this.log.warn({ err, key }, "failed to release key after shortcut error");
			}
		}
		pressed.length = 0;
	}
}
