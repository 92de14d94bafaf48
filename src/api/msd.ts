// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Virtual media (mass storage device) control. Images live in the device's
 * storage; one of them can be attached to the target as a CD-ROM or flash drive.
 */

import { z } from "zod/v4";
import type { RequestTransport } from "../kvm/transport.js";
import type { JsonObject } from "../kvm/types.js";

const imagesSchema = z.record(z.string(), z.looseObject({}));

const statusSchema = z.looseObject({
	storage: z.looseObject({ images: imagesSchema.optional() }).optional(),
});

export type MsdImages = Record<string, JsonObject>;

export class Msd {
	private readonly transport: RequestTransport;

	constructor(transport: RequestTransport) {
		this.transport = transport;
	}

	/** Drive state, connected image and storage usage. */
	async status(): Promise<JsonObject> {
		return this.transport.get("/api/msd");
	}

	/** Images in storage, keyed by name. Empty when the device reports none. */
	async listImages(): Promise<MsdImages> {
		const parsed = statusSchema.safeParse(await this.status());
		return parsed.success ? (parsed.data.storage?.images ?? {}) : {};
	}

	/** Write image bytes to storage under `imageName`. */
	async upload(data: Uint8Array, imageName: string): Promise<JsonObject> {
		return this.transport.post(
			"/api/msd/write",
			{ image: imageName },
			{ body: data, contentType: "application/octet-stream" },
		);
	}

	/** Have the device download an image itself. The name is derived from the URL if omitted. */
	async uploadUrl(url: string, imageName?: string): Promise<JsonObject> {
		return this.transport.post("/api/msd/write_remote", { url, image: imageName });
	}

	/** Select the active image and drive mode (CD-ROM, or flash drive when `cdrom` is false). */
	async setImage(imageName: string, cdrom = true): Promise<JsonObject> {
		return this.transport.post("/api/msd/set_params", {
			image: imageName,
			cdrom: cdrom ? 1 : 0,
		});
	}

	async connect(): Promise<JsonObject> {
		return this.transport.post("/api/msd/set_connected", { connected: 1 });
	}

	async disconnect(): Promise<JsonObject> {
		return this.transport.post("/api/msd/set_connected", { connected: 0 });
	}

	async removeImage(imageName: string): Promise<JsonObject> {
		return this.transport.post("/api/msd/remove", { image: imageName });
	}
}
