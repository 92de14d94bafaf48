// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Every client operation by name, as one table over {@link AsyncKvmClient}.
 * The blocking client sends these names across the worker boundary, so both
 * execution models run the same code.
 */

import type { AtxButton } from "../api/atx.js";
import type { MsdImages } from "../api/msd.js";
import type { MouseButton } from "../kvm/protocol.js";
import type { ChannelState, JsonObject } from "../kvm/types.js";
import type { AsyncKvmClient } from "./async-client.js";

type XY = [x?: number, y?: number];

export interface OperationArgs {
	info: [];
	streamerInfo: [];
	connect: [];
	channelState: [];
	"keyboard.press": [key: string];
	"keyboard.hold": [key: string];
	"keyboard.release": [key: string];
	"keyboard.shortcut": string[];
	"keyboard.type": [text: string];
	"keyboard.print": [text: string, keymap?: string];
	"mouse.move": [x: number, y: number];
	"mouse.click": [x?: number, y?: number, button?: MouseButton];
	"mouse.rightClick": XY;
	"mouse.middleClick": XY;
	"mouse.doubleClick": [x?: number, y?: number, button?: MouseButton];
	"mouse.drag": [
		x1: number,
		y1: number,
		x2: number,
		y2: number,
		button?: MouseButton,
		steps?: number,
	];
	"mouse.scroll": [dx?: number, dy?: number];
	"mouse.relativeMove": [dx: number, dy: number];
	"video.screenshot": [];
	"video.streamerInfo": [];
	"msd.status": [];
	"msd.listImages": [];
	"msd.upload": [data: Uint8Array, imageName: string];
	"msd.uploadUrl": [url: string, imageName?: string];
	"msd.setImage": [imageName: string, cdrom?: boolean];
	"msd.connect": [];
	"msd.disconnect": [];
	"msd.removeImage": [imageName: string];
	"atx.status": [];
	"atx.shortPress": [];
	"atx.longPress": [];
	"atx.reset": [];
	"atx.click": [button: AtxButton];
}

export interface OperationResults {
	info: JsonObject;
	streamerInfo: JsonObject;
	connect: void;
	channelState: ChannelState;
	"keyboard.press": void;
	"keyboard.hold": void;
	"keyboard.release": void;
	"keyboard.shortcut": void;
	"keyboard.type": void;
	"keyboard.print": void;
	"mouse.move": void;
	"mouse.click": void;
	"mouse.rightClick": void;
	"mouse.middleClick": void;
	"mouse.doubleClick": void;
	"mouse.drag": void;
	"mouse.scroll": void;
	"mouse.relativeMove": void;
	/** Buffers cross the worker boundary as plain Uint8Array */
	"video.screenshot": Uint8Array;
	"video.streamerInfo": JsonObject;
	"msd.status": JsonObject;
	"msd.listImages": MsdImages;
	"msd.upload": JsonObject;
	"msd.uploadUrl": JsonObject;
	"msd.setImage": JsonObject;
	"msd.connect": JsonObject;
	"msd.disconnect": JsonObject;
	"msd.removeImage": JsonObject;
	"atx.status": JsonObject;
	"atx.shortPress": JsonObject;
	"atx.longPress": JsonObject;
	"atx.reset": JsonObject;
	"atx.click": JsonObject;
}

export type OperationName = keyof OperationArgs;

type OperationTable = {
	readonly [K in OperationName]: (
		client: AsyncKvmClient,
		...args: OperationArgs[K]
	) => Promise<OperationResults[K]>;
};

export const operations: OperationTable = {
	info: (c) => c.info(),
	streamerInfo: (c) => c.streamerInfo(),
	connect: (c) => c.connect(),
	channelState: async (c) => c.channelState,
	"keyboard.press": (c, key) => c.keyboard.press(key),
	"keyboard.hold": (c, key) => c.keyboard.hold(key),
	"keyboard.release": (c, key) => c.keyboard.release(key),
	"keyboard.shortcut": (c, ...keys) => c.keyboard.shortcut(...keys),
	"keyboard.type": (c, text) => c.keyboard.type(text),
	"keyboard.print": (c, text, keymap) => c.keyboard.print(text, keymap),
	"mouse.move": (c, x, y) => c.mouse.move(x, y),
	"mouse.click": (c, x, y, button) => c.mouse.click(x, y, button),
	"mouse.rightClick": (c, x, y) => c.mouse.rightClick(x, y),
	"mouse.middleClick": (c, x, y) => c.mouse.middleClick(x, y),
	"mouse.doubleClick": (c, x, y, button) => c.mouse.doubleClick(x, y, button),
	"mouse.drag": (c, x1, y1, x2, y2, button, steps) => c.mouse.drag(x1, y1, x2, y2, button, steps),
	"mouse.scroll": (c, dx, dy) => c.mouse.scroll(dx, dy),
	"mouse.relativeMove": (c, dx, dy) => c.mouse.relativeMove(dx, dy),
	"video.screenshot": (c) => c.video.screenshot(),
	"video.streamerInfo": (c) => c.video.streamerInfo(),
	"msd.status": (c) => c.msd.status(),
	"msd.listImages": (c) => c.msd.listImages(),
	"msd.upload": (c, data, imageName) => c.msd.upload(data, imageName),
	"msd.uploadUrl": (c, url, imageName) => c.msd.uploadUrl(url, imageName),
	"msd.setImage": (c, imageName, cdrom) => c.msd.setImage(imageName, cdrom),
	"msd.connect": (c) => c.msd.connect(),
	"msd.disconnect": (c) => c.msd.disconnect(),
	"msd.removeImage": (c, imageName) => c.msd.removeImage(imageName),
	"atx.status": (c) => c.atx.status(),
	"atx.shortPress": (c) => c.atx.shortPress(),
	"atx.longPress": (c) => c.atx.longPress(),
	"atx.reset": (c) => c.atx.reset(),
	"atx.click": (c, button) => c.atx.click(button),
};

export function dispatch<K extends OperationName>(
	client: AsyncKvmClient,
	name: K,
	args: OperationArgs[K],
): Promise<OperationResults[K]> {
	const operation: (
		client: AsyncKvmClient,
		...args: OperationArgs[K]
	) => Promise<OperationResults[K]> = operations[name];
	return operation(client, ...args);
}
