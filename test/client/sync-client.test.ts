// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * The blocking client suspends this thread on every call, so the mock device
 * runs in a child process (see helpers/device-process.ts).
 */

import { pino } from "pino";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { AsyncKvmClient } from "../../src/client/async-client.js";
import { KvmClient } from "../../src/client/sync-client.js";
import { ApiError, AuthError, ConfigError, UnknownKeyError } from "../../src/errors.js";
import type { KvmClientOptions } from "../../src/kvm/types.js";
import { ForkedDevice } from "../helpers/forked-device.js";
import { DEVICE_INFO, SNAPSHOT_BYTES } from "../helpers/mock-kvm-device.js";

const NO_DELAY = { keyDelay: 0, shortcutPause: 0, clickDelay: 0, doubleClickGap: 0 };

describe("KvmClient", () => {
	let device: ForkedDevice;
	let options: KvmClientOptions;
	let kvm: KvmClient;

	beforeAll(async () => {
		// Read by the worker's logger when the worker starts
		vi.stubEnv("LOG_LEVEL", "silent");
		device = await ForkedDevice.start();
		options = { host: device.baseUrl, password: "test-secret", timing: NO_DELAY };
	});

	afterAll(async () => {
		vi.unstubAllEnvs();
		await device.stop();
	});

	beforeEach(async () => {
		await device.clearEvents();
		kvm = new KvmClient(options);
	});

	afterEach(() => {
		kvm.close();
	});

	it("should return REST results synchronously", () => {
		expect(kvm.info()).toEqual(DEVICE_INFO);
		expect(kvm.atx.status()).toEqual({ enabled: true, leds: { power: true, hdd: false } });
	});

	it("should return the snapshot as a Buffer", () => {
		const jpeg = kvm.video.screenshot();
		expect(Buffer.isBuffer(jpeg)).toBe(true);
		expect(jpeg.equals(SNAPSHOT_BYTES)).toBe(true);
	});

	it("should send a key press as press then release", async () => {
		kvm.keyboard.press("Digit5");
		expect(await device.waitForEvents(2)).toEqual([
			{ event_type: "key", event: { key: "Digit5", state: true } },
			{ event_type: "key", event: { key: "Digit5", state: false } },
		]);
	});

	it("should send a drag as four events", async () => {
		kvm.mouse.drag(100, 100, 500, 500);
		expect(await device.waitForEvents(4)).toEqual([
			{ event_type: "mouse_move", event: { to: { x: 100, y: 100 } } },
			{ event_type: "mouse_button", event: { button: "left", state: true } },
			{ event_type: "mouse_move", event: { to: { x: 500, y: 500 } } },
			{ event_type: "mouse_button", event: { button: "left", state: false } },
		]);
	});

	it("should put the same events on the wire as the Promise-based client", async () => {
		kvm.keyboard.type("Hi");
		kvm.keyboard.shortcut("ControlLeft", "KeyV");
		kvm.mouse.doubleClick(10, 20);
		kvm.mouse.scroll(0, -2);
		kvm.mouse.relativeMove(4, -4);
		const blocking = await device.waitForEvents(17);

		await device.clearEvents();
		const async = new AsyncKvmClient({ ...options, logger: pino({ level: "silent" }) });
		try {
			await async.keyboard.type("Hi");
			await async.keyboard.shortcut("ControlLeft", "KeyV");
			await async.mouse.doubleClick(10, 20);
			await async.mouse.scroll(0, -2);
			await async.mouse.relativeMove(4, -4);
		} finally {
			await async.close();
		}
		const promised = await device.waitForEvents(17);

		expect(blocking).toHaveLength(17);
		expect(promised).toEqual(blocking);
	});

	it("should revive errors into their original classes", () => {
		expect(() => kvm.keyboard.press("Nope")).toThrow(UnknownKeyError);

		try {
			kvm.msd.removeImage("missing.iso");
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(ApiError);
			expect(err).toMatchObject({
				code: "MsdUnknownImageError",
				message: "MsdUnknownImageError: The image is not found in the storage",
			});
		}
	});

	it("should throw ConfigError from the constructor", () => {
		vi.stubEnv("KVM_HOST", "");
		expect(() => new KvmClient({})).toThrow(ConfigError);
	});

	it("should log in exactly once more after the session is rejected", async () => {
		kvm.info();
		const before = await device.stats();

		await device.revokeTokens();
		expect(() => kvm.info()).toThrow(AuthError);
		expect((await device.stats()).loginCount).toBe(before.loginCount);

		expect(kvm.info()).toEqual(DEVICE_INFO);
		kvm.atx.status();
		expect((await device.stats()).loginCount).toBe(before.loginCount + 1);
	});

	it("should reuse the channel and reopen it after close", async () => {
		const start = await device.stats();

		kvm.keyboard.press("KeyA");
		kvm.keyboard.press("KeyB");
		expect(kvm.channelState).toBe("OPEN");
		await device.waitForEvents(4);
		expect((await device.stats()).wsConnections).toBe(start.wsConnections + 1);

		kvm.close();
		kvm.close();
		expect(kvm.channelState).toBe("CLOSED");

		kvm.keyboard.press("KeyC");
		expect(kvm.channelState).toBe("OPEN");
		await device.waitForEvents(6);
		expect((await device.stats()).wsConnections).toBe(start.wsConnections + 2);
	});

	it("should close the client when a scoped block throws", () => {
		const seen: KvmClient[] = [];
		expect(() =>
			KvmClient.use(options, (client) => {
				seen.push(client);
				client.keyboard.press("Escape");
				throw new Error("boom");
			}),
		).toThrow("boom");
		expect(seen[0].channelState).toBe("CLOSED");
	});

	it("should return the scoped block's result", () => {
		const info = KvmClient.use(options, (client) => client.info());
		expect(info).toEqual(DEVICE_INFO);
	});
});
