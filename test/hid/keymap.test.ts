// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

import { describe, expect, it } from "vitest";
import { UnknownKeyError, UnsupportedCharacterError } from "../../src/errors.js";
import {
	isKnownKey,
	keyNames,
	resolve,
	translateCharacter,
	translateText,
} from "../../src/hid/keymap.js";

describe("resolve", () => {
	it("should map letters, digits and modifiers to HID usage codes", () => {
		expect(resolve("KeyA")).toBe(4);
		expect(resolve("KeyZ")).toBe(29);
		expect(resolve("Digit1")).toBe(30);
		expect(resolve("Digit0")).toBe(39);
		expect(resolve("Enter")).toBe(40);
		expect(resolve("F12")).toBe(69);
		expect(resolve("ArrowUp")).toBe(82);
		expect(resolve("ControlLeft")).toBe(224);
		expect(resolve("MetaRight")).toBe(231);
	});

	it("should resolve every documented name to a stable code", () => {
		const names = keyNames();
		expect(names).toHaveLength(107);
		for (const name of names) {
			expect(resolve(name)).toBe(resolve(name));
			expect(isKnownKey(name)).toBe(true);
		}
	});

	it("should give every name a distinct code", () => {
		const codes = keyNames().map((name) => resolve(name));
		expect(new Set(codes).size).toBe(codes.length);
	});

	it("should reject unknown names with UnknownKeyError", () => {
		expect(() => resolve("KeyAA")).toThrow(UnknownKeyError);
		expect(() => resolve("enter")).toThrow(UnknownKeyError);
		expect(isKnownKey("Hyper")).toBe(false);

		try {
			resolve("Hyper");
		} catch (err) {
			expect(err).toBeInstanceOf(UnknownKeyError);
			expect(err).toMatchObject({ category: "keymap", code: "unknown_key", key: "Hyper" });
		}
	});
});

describe("translateCharacter", () => {
	it("should type lowercase letters without shift", () => {
		expect(translateCharacter("a")).toEqual([{ key: "KeyA", shift: false }]);
	});

	it("should type uppercase letters and shifted symbols with shift", () => {
		expect(translateCharacter("A")).toEqual([{ key: "KeyA", shift: true }]);
		expect(translateCharacter("!")).toEqual([{ key: "Digit1", shift: true }]);
		expect(translateCharacter(")")).toEqual([{ key: "Digit0", shift: true }]);
		expect(translateCharacter("?")).toEqual([{ key: "Slash", shift: true }]);
		expect(translateCharacter("~")).toEqual([{ key: "Backquote", shift: true }]);
	});

	it("should map space and unshifted punctuation", () => {
		expect(translateCharacter(" ")).toEqual([{ key: "Space", shift: false }]);
		expect(translateCharacter("-")).toEqual([{ key: "Minus", shift: false }]);
		expect(translateCharacter("\\")).toEqual([{ key: "Backslash", shift: false }]);
	});

	it("should cover all 95 printable ASCII characters", () => {
		for (let code = 0x20; code <= 0x7e; code++) {
			const [stroke] = translateCharacter(String.fromCharCode(code));
			expect(isKnownKey(stroke.key)).toBe(true);
		}
	});

	it("should reject control and non-ASCII characters", () => {
		expect(() => translateCharacter("\n")).toThrow(UnsupportedCharacterError);
		expect(() => translateCharacter("\t")).toThrow(UnsupportedCharacterError);
		expect(() => translateCharacter("é")).toThrow("Cannot type character U+00E9");
	});
});

describe("translateText", () => {
	it("should translate in order", () => {
		expect(translateText("Hi!")).toEqual([
			{ key: "KeyH", shift: true },
			{ key: "KeyI", shift: false },
			{ key: "Digit1", shift: true },
		]);
	});

	it("should fail on the first unsupported character", () => {
		expect(() => translateText("ok\nno")).toThrow(UnsupportedCharacterError);
	});

	it("should treat astral characters as one code point", () => {
		try {
			translateText("a😀");
			expect.unreachable();
		} catch (err) {
			expect(err).toMatchObject({ character: "😀", message: "Cannot type character U+1F600" });
		}
	});
});
