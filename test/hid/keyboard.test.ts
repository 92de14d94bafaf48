// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

import { type Logger, pino } from "pino";
import { beforeEach, describe, expect, it } from "vitest";
import { TransportError, UnknownKeyError, UnsupportedCharacterError } from "../../src/errors.js";
import { Keyboard } from "../../src/hid/keyboard.js";
import { HttpConnection } from "../../src/kvm/http.js";
import { SessionAuthenticator } from "../../src/kvm/session.js";
import { RequestTransport } from "../../src/kvm/transport.js";
import type { Credential, GestureTiming } from "../../src/kvm/types.js";
import { RecordingSink, describeEvent } from "../helpers/recording-sink.js";

const NO_DELAY: GestureTiming = {
	keyDelay: 0,
	shortcutPause: 0,
	clickDelay: 0,
	doubleClickGap: 0,
};

/** REST side for print; the gestures under test never reach it. */
function unusedTransport(logger: Logger): RequestTransport {
	const credential: Credential = {
		baseUrl: "http://127.0.0.1:9",
		username: "admin",
		password: "test-secret",
		verifyTls: false,
	};
	const http = new HttpConnection(credential, 1000);
	return new RequestTransport(http, new SessionAuthenticator(credential, http, logger), logger);
}

describe("Keyboard", () => {
	let sink: RecordingSink;
	let keyboard: Keyboard;
	let logLines: string[];

	const events = () => sink.events.map(describeEvent);

	beforeEach(() => {
		sink = new RecordingSink();
		logLines = [];
		const logger = pino({ level: "warn" }, { write: (line: string) => logLines.push(line) });
		keyboard = new Keyboard(sink, unusedTransport(logger), NO_DELAY, logger);
	});

	it("should press then release a key", async () => {
		await keyboard.press("Digit5");
		expect(events()).toEqual(["key:Digit5:down", "key:Digit5:up"]);
	});

	it("should keep a press contiguous under concurrent calls", async () => {
		await Promise.all([keyboard.press("Digit5"), keyboard.type("ab"), keyboard.press("Enter")]);
		expect(events()).toEqual([
			"key:Digit5:down",
			"key:Digit5:up",
			"key:KeyA:down",
			"key:KeyA:up",
			"key:KeyB:down",
			"key:KeyB:up",
			"key:Enter:down",
			"key:Enter:up",
		]);
	});

	it("should send a single event for hold and release", async () => {
		await keyboard.hold("ShiftLeft");
		await keyboard.release("ShiftLeft");
		expect(events()).toEqual(["key:ShiftLeft:down", "key:ShiftLeft:up"]);
	});

	it("should bracket shifted characters with ShiftLeft", async () => {
		await keyboard.type("aB");
		expect(events()).toEqual([
			"key:KeyA:down",
			"key:KeyA:up",
			"key:ShiftLeft:down",
			"key:KeyB:down",
			"key:KeyB:up",
			"key:ShiftLeft:up",
		]);
	});

	it("should type text whose key presses decode back to the same text", async () => {
		const text = "Hello, World! 1+1=2 (ok?)";
		await keyboard.type(text);

		const keyOf = new Map<string, string>([
			["Space", " "],
			["Comma", ","],
			["Digit1", "1"],
			["Digit2", "2"],
			["Equal", "="],
			["Digit9", "9"],
			["Digit0", "0"],
			["Slash", "/"],
		]);
		const shifted = new Map<string, string>([
			["1", "!"],
			["=", "+"],
			["9", "("],
			["0", ")"],
			["/", "?"],
		]);

		let shift = false;
		let decoded = "";
		for (const event of sink.events) {
			if (event.kind !== "key") continue;
			if (event.key === "ShiftLeft") {
				shift = event.pressed;
				continue;
			}
			if (!event.pressed) continue;
			const base = event.key.startsWith("Key")
				? event.key.slice(3).toLowerCase()
				: (keyOf.get(event.key) ?? "?");
			decoded += shift ? (shifted.get(base) ?? base.toUpperCase()) : base;
		}
		expect(decoded).toBe(text);
	});

	it("should send nothing when a character is unsupported", async () => {
		await expect(keyboard.type("abc\n")).rejects.toThrow(UnsupportedCharacterError);
		expect(sink.events).toHaveLength(0);
	});

	it("should send nothing when a key name is unknown", async () => {
		await expect(keyboard.press("Nope")).rejects.toThrow(UnknownKeyError);
		await expect(keyboard.shortcut("ControlLeft", "Nope")).rejects.toThrow(UnknownKeyError);
		expect(sink.events).toHaveLength(0);
	});

	it("should press a shortcut in order and release it in reverse", async () => {
		await keyboard.shortcut("ControlLeft", "AltLeft", "Delete");
		expect(events()).toEqual([
			"key:ControlLeft:down",
			"key:AltLeft:down",
			"key:Delete:down",
			"key:Delete:up",
			"key:AltLeft:up",
			"key:ControlLeft:up",
		]);
	});

	it("should release pressed keys in reverse when a shortcut press fails", async () => {
		sink.failWhen = (event) => event.kind === "key" && event.key === "Delete" && event.pressed;

		await expect(keyboard.shortcut("ControlLeft", "AltLeft", "Delete")).rejects.toThrow(
			TransportError,
		);
		expect(events()).toEqual([
			"key:ControlLeft:down",
			"key:AltLeft:down",
			"key:AltLeft:up",
			"key:ControlLeft:up",
		]);
	});

	it("should still release the remaining keys when a release fails", async () => {
		sink.failWhen = (event) => event.kind === "key" && event.key === "AltLeft" && !event.pressed;

		await expect(keyboard.shortcut("ControlLeft", "AltLeft", "Delete")).rejects.toThrow(
			"injected write failure",
		);
		expect(events()).toEqual([
			"key:ControlLeft:down",
			"key:AltLeft:down",
			"key:Delete:down",
			"key:Delete:up",
			"key:ControlLeft:up",
		]);
	});

	it("should log a failed cleanup release and rethrow the original error", async () => {
		sink.failWhen = (event) =>
			event.kind === "key" &&
			((event.key === "KeyC" && event.pressed) || (event.key === "ControlLeft" && !event.pressed));

		await expect(keyboard.shortcut("ControlLeft", "KeyC")).rejects.toThrow(TransportError);
		expect(events()).toEqual(["key:ControlLeft:down"]);

		expect(logLines).toHaveLength(1);
		const entry = JSON.parse(logLines[0]);
		expect(entry.msg).toBe("failed to release key after shortcut error");
		expect(entry.key).toBe("ControlLeft");
		expect(entry.component).toBe("keyboard");
	});
});
