// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

import type { RequestTransport } from "../kvm/transport.js";
import type { JsonObject } from "../kvm/types.js";

export const AtxButton = {
	Power: "power",
	PowerLong: "power_long",
	Reset: "reset",
} as const;
export type AtxButton = (typeof AtxButton)[keyof typeof AtxButton];

/** ATX power control of the target machine. */
export class Atx {
	private readonly transport: RequestTransport;

	constructor(transport: RequestTransport) {
		this.transport = transport;
	}

	/** Power and HDD LED state. */
	async status(): Promise<JsonObject> {
		return this.transport.get("/api/atx");
	}

	/** Short press of the power button (normal power on/off). */
	async shortPress(): Promise<JsonObject> {
		return this.click(AtxButton.Power);
	}

	/** Long press of the power button (forced power off). */
	async longPress(): Promise<JsonObject> {
		return this.click(AtxButton.PowerLong);
	}

	async reset(): Promise<JsonObject> {
		return this.click(AtxButton.Reset);
	}

	async click(button: AtxButton): Promise<JsonObject> {
		return this.transport.post("/api/atx/click", { button });
	}
}
