// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Mouse gestures. Coordinates are absolute pixels in the device's capture
 * resolution and are passed through unscaled.
 */

import type { EventSink, EventWriter } from "../kvm/event-channel.js";
import { type MouseButton, buttonEvent, moveEvent } from "../kvm/protocol.js";
import type { GestureTiming } from "../kvm/types.js";
import { sleep } from "./timing.js";

export class Mouse {
	private readonly sink: EventSink;
	private readonly timing: GestureTiming;

	constructor(sink: EventSink, timing: GestureTiming) {
		this.sink = sink;
		this.timing = timing;
	}

	async move(x: number, y: number): Promise<void> {
		await this.sink.exclusive((write) => write(moveEvent(x, y)));
	}

	/** Click at (x, y), or at the current cursor position when no coordinates are given. */
	async click(x?: number, y?: number, button: MouseButton = "left"): Promise<void> {
		await this.sink.exclusive((write) => this.clickSequence(write, x, y, button));
	}

	async rightClick(x?: number, y?: number): Promise<void> {
		await this.click(x, y, "right");
	}

	async middleClick(x?: number, y?: number): Promise<void> {
		await this.click(x, y, "middle");
	}

	async doubleClick(x?: number, y?: number, button: MouseButton = "left"): Promise<void> {
		await this.sink.exclusive(async (write) => {
			await this.clickSequence(write, x, y, button);
			await sleep(this.timing.doubleClickGap);
			// The cursor is already there; no second move
			await this.clickSequence(write, undefined, undefined, button);
		});
	}

	/**
	 * Press at (x1, y1), move to (x2, y2), release. With `steps` > 1 the path
	 * is split into that many evenly spaced moves.
	 */
	async drag(
		x1: number,
		y1: number,
		x2: number,
		y2: number,
		button: MouseButton = "left",
		steps = 1,
	): Promise<void> {
		if (!Number.isInteger(steps) || steps < 1) {
			throw new RangeError(`drag steps must be a positive integer, got ${steps}`);
		}

		await this.sink.exclusive(async (write) => {
			await write(moveEvent(x1, y1));
			await write(buttonEvent(button, true));
			for (let i = 1; i <= steps; i++) {
				await sleep(this.timing.clickDelay);
				const x = Math.trunc(x1 + ((x2 - x1) * i) / steps);
				const y = Math.trunc(y1 + ((y2 - y1) * i) / steps);
				await write(moveEvent(x, y));
			}
			await sleep(this.timing.clickDelay);
			await write(buttonEvent(button, false));
		});
	}

	/** Wheel by (dx, dy); negative dy scrolls up. */
	async scroll(dx = 0, dy = 0): Promise<void> {
		await this.sink.exclusive((write) => write({ kind: "wheel", deltaX: dx, deltaY: dy }));
	}

	async relativeMove(dx: number, dy: number): Promise<void> {
		await this.sink.exclusive((write) => write({ kind: "relative", dx, dy }));
	}

	private async clickSequence(
		write: EventWriter,
		x: number | undefined,
		y: number | undefined,
		button: MouseButton,
	): Promise<void> {
		if (x !== undefined && y !== undefined) {
			await write(moveEvent(x, y));
			await sleep(this.timing.clickDelay);
		}
		await write(buttonEvent(button, true));
		await sleep(this.timing.clickDelay);
		await write(buttonEvent(button, false));
	}
}
