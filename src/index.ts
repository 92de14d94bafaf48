// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

export { Atx, AtxButton } from "./api/atx.js";
export { Msd, type MsdImages } from "./api/msd.js";
export { Video } from "./api/video.js";
export { AsyncKvmClient, withKvmClient } from "./client/async-client.js";
export type { OperationArgs, OperationName, OperationResults } from "./client/operations.js";
export {
	KvmClient,
	SyncAtx,
	SyncKeyboard,
	SyncMouse,
	SyncMsd,
	SyncVideo,
} from "./client/sync-client.js";
export { DEFAULT_TIMING, ENV, resolveClientConfig } from "./config.js";
export {
	ApiError,
	AuthError,
	ConfigError,
	type ErrorCategory,
	KvmError,
	TransportError,
	UnknownKeyError,
	UnsupportedCharacterError,
} from "./errors.js";
export { Keyboard } from "./hid/keyboard.js";
export {
	type KeyStroke,
	isKnownKey,
	keyNames,
	resolve,
	translateCharacter,
	translateText,
} from "./hid/keymap.js";
export { Mouse } from "./hid/mouse.js";
export type { EventSink, EventWriter } from "./kvm/event-channel.js";
export type { HidEvent, KeyEvent, MouseButton, MouseEvent } from "./kvm/protocol.js";
export type {
	ChannelState,
	ClientConfig,
	Credential,
	DeviceNotification,
	GestureTiming,
	JsonObject,
	KvmClientOptions,
	NotificationListener,
	Session,
} from "./kvm/types.js";
export { type Logger, createLogger } from "./logger.js";
