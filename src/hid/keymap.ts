// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Static key tables.
 *
 * Symbolic names follow the W3C `KeyboardEvent.code` values the device uses
 * on the wire ("KeyA", "ControlLeft", ...). Each name maps to its USB HID
 * usage ID on the keyboard page (0x07). Printable ASCII maps to the key and
 * shift state that produce it on a US layout.
 *
 * The tables live in data/keymap.json and are loaded and frozen once.
 */

import { readFileSync } from "node:fs";
import { z } from "zod/v4";
import { UnknownKeyError, UnsupportedCharacterError } from "../errors.js";

/** One key press needed to produce a character. */
export interface KeyStroke {
	readonly key: string;
	readonly shift: boolean;
}

const keymapFileSchema = z.object({
	keys: z.record(z.string(), z.number().int().min(0).max(0xff)),
	characters: z.record(z.string().length(1), z.tuple([z.string(), z.boolean()])),
});

function loadTables(): {
	keys: ReadonlyMap<string, number>;
	characters: ReadonlyMap<string, KeyStroke>;
} {
	// Same relative location from src/hid and dist/hid
	const file = new URL("../../data/keymap.json", import.meta.url);
	const data = keymapFileSchema.parse(JSON.parse(readFileSync(file, "utf8")));

	const keys = new Map(Object.entries(data.keys));
	const characters = new Map<string, KeyStroke>();
	for (const [ch, [key, shift]] of Object.entries(data.characters)) {
		if (!keys.has(key)) {
			throw new Error(`keymap.json: character ${JSON.stringify(ch)} uses unknown key ${key}`);
		}
		characters.set(ch, Object.freeze({ key, shift }));
	}
	return { keys, characters };
}

const { keys: KEYCODES, characters: CHARACTERS } = loadTables();

/** Resolve a symbolic key name to its HID usage code. */
export function resolve(name: string): number {
	const code = KEYCODES.get(name);
	if (code === undefined) {
		throw new UnknownKeyError(name);
	}
	return code;
}

export function isKnownKey(name: string): boolean {
	return KEYCODES.has(name);
}

/** All symbolic key names in table order. */
export function keyNames(): readonly string[] {
	return [...KEYCODES.keys()];
}

/**
 * Keystrokes that type `ch` on the target. Only printable ASCII is covered;
 * control characters (newline included) are rejected.
 */
export function translateCharacter(ch: string): readonly KeyStroke[] {
	const stroke = CHARACTERS.get(ch);
	if (!stroke) {
		throw new UnsupportedCharacterError(ch);
	}
	return [stroke];
}

/** Translate a whole string up front, so nothing is sent if any character is unsupported. */
export function translateText(text: string): readonly KeyStroke[] {
	const strokes: KeyStroke[] = [];
	for (const ch of text) {
		strokes.push(...translateCharacter(ch));
	}
	return strokes;
}

/** Modifier used for shifted characters. */
export const SHIFT_KEY = "ShiftLeft";
