// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * HID event model and its JSON encoding on the device WebSocket.
 *
 * Every event travels as one text frame:
 *   {"event_type": "<type>", "event": {...}}
 *
 * The device answers the connection with a burst of state messages
 * (hid_state, atx_state, streamer, ...) followed by a "loop" marker.
 */

export type MouseButton = "left" | "right" | "middle" | "up" | "down";

export interface KeyEvent {
	readonly kind: "key";
	/** Symbolic key name, e.g. "KeyA" */
	readonly key: string;
	readonly pressed: boolean;
}

export interface MouseMoveEvent {
	readonly kind: "move";
	readonly x: number;
	readonly y: number;
}

export interface MouseButtonEvent {
	readonly kind: "button";
	readonly button: MouseButton;
	readonly pressed: boolean;
}

export interface MouseWheelEvent {
	readonly kind: "wheel";
	readonly deltaX: number;
	readonly deltaY: number;
}

export interface MouseRelativeEvent {
	readonly kind: "relative";
	readonly dx: number;
	readonly dy: number;
}

export type MouseEvent = MouseMoveEvent | MouseButtonEvent | MouseWheelEvent | MouseRelativeEvent;

export type HidEvent = KeyEvent | MouseEvent;

export const EventType = {
	Key: "key",
	MouseMove: "mouse_move",
	MouseButton: "mouse_button",
	MouseWheel: "mouse_wheel",
	MouseRelative: "mouse_relative",
} as const;
export type EventType = (typeof EventType)[keyof typeof EventType];

/** Message types that end the device's initial state burst. */
export const HANDSHAKE_MARKERS: ReadonlySet<string> = new Set(["loop", "streamer"]);

/** WebSocket path; stream=0 disables the MJPEG feed on the socket. */
export const WS_PATH = "/api/ws?stream=0";

export const SESSION_COOKIE = "auth_token";

export interface WireMessage {
	readonly event_type: EventType;
	readonly event: Record<string, unknown>;
}

export function toWireMessage(event: HidEvent): WireMessage {
	switch (event.kind) {
		case "key":
			return { event_type: EventType.Key, event: { key: event.key, state: event.pressed } };
		case "move":
			return { event_type: EventType.MouseMove, event: { to: { x: event.x, y: event.y } } };
		case "button":
			return {
				event_type: EventType.MouseButton,
				event: { button: event.button, state: event.pressed },
			};
		case "wheel":
			return {
				event_type: EventType.MouseWheel,
				event: { delta: { x: event.deltaX, y: event.deltaY } },
			};
		case "relative":
			return {
				event_type: EventType.MouseRelative,
				event: { delta: { x: event.dx, y: event.dy } },
			};
	}
}

export function encodeEvent(event: HidEvent): string {
	return JSON.stringify(toWireMessage(event));
}

export const keyEvent = (key: string, pressed: boolean): KeyEvent => ({
	kind: "key",
	key,
	pressed,
});

export const moveEvent = (x: number, y: number): MouseMoveEvent => ({ kind: "move", x, y });

export const buttonEvent = (button: MouseButton, pressed: boolean): MouseButtonEvent => ({
	kind: "button",
	button,
	pressed,
});

/** Parse an incoming frame; returns null for anything that is not a device message. */
export function parseDeviceMessage(data: string): { eventType: string; event: unknown } | null {
	let parsed: unknown;
	try {
		parsed = JSON.parse(data);
	} catch {
		return null;
	}
	if (typeof parsed !== "object" || parsed === null || !("event_type" in parsed)) {
		return null;
	}
	const eventType = parsed.event_type;
	if (typeof eventType !== "string") return null;
	return { eventType, event: "event" in parsed ? parsed.event : undefined };
}
