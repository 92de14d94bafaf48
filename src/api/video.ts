// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

import type { RequestTransport } from "../kvm/transport.js";
import type { JsonObject } from "../kvm/types.js";

/** Video capture. The device encodes snapshots as JPEG; the bytes are passed through untouched. */
export class Video {
	private readonly transport: RequestTransport;

	constructor(transport: RequestTransport) {
		this.transport = transport;
	}

	/** Capture the current screen as JPEG bytes. */
	async screenshot(): Promise<Buffer> {
		return this.transport.getBytes("/api/streamer/snapshot");
	}

	/** Streamer state: source resolution, fps, encoder, etc. */
	async streamerInfo(): Promise<JsonObject> {
		return this.transport.get("/api/streamer");
	}
}
