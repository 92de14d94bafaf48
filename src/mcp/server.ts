// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * MCP server setup with tool definitions.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod/v4";
import { AtxButton } from "../api/atx.js";
import type { AsyncKvmClient } from "../client/async-client.js";

const buttonSchema = z
	.enum(["left", "right", "middle"])
	.optional()
	.default("left")
	.describe("Mouse button");

function text(value: string) {
	return { content: [{ type: "text" as const, text: value }] };
}

function json(value: unknown) {
	return text(JSON.stringify(value, null, 2));
}

export function createMcpServer(kvm: AsyncKvmClient): McpServer {
	const server = new McpServer({
		name: "kvmlink",
		version: "0.1.0",
	});

	server.tool(
		"get_info",
		"Get information about the KVM device (hardware, firmware, hostname)",
		{},
		async () => json(await kvm.info()),
	);

	server.tool(
		"get_screenshot",
		"Capture a screenshot of the target machine's screen. Returns a JPEG image in the capture resolution, which is also the coordinate space for mouse tools.",
		{},
		async () => {
			const jpeg = await kvm.video.screenshot();
			return {
				content: [
					{
						type: "image",
						data: jpeg.toString("base64"),
						mimeType: "image/jpeg",
					},
				],
			};
		},
	);

	server.tool(
		"type_text",
		"Type text on the target machine. 'keys' sends one key event per character (printable ASCII only); 'print' lets the device type it using its keymap.",
		{
			text: z.string().describe("Text to type"),
			method: z
				.enum(["keys", "print"])
				.optional()
				.default("keys")
				.describe("How the text is typed"),
		},
		async ({ text: value, method }) => {
			if (method === "print") {
				await kvm.keyboard.print(value);
			} else {
				await kvm.keyboard.type(value);
			}
			return text(`Typed ${value.length} characters`);
		},
	);

	server.tool(
		"press_key",
		"Press and release one key, by web key name (e.g. 'Enter', 'KeyA', 'F2', 'ArrowDown')",
		{ key: z.string().describe("Key name") },
		async ({ key }) => {
			await kvm.keyboard.press(key);
			return text(`Pressed ${key}`);
		},
	);

	server.tool(
		"key_shortcut",
		"Press a key combination, e.g. ['ControlLeft', 'AltLeft', 'Delete']. Keys are pressed in order and released in reverse.",
		{ keys: z.array(z.string()).min(1).describe("Key names, modifiers first") },
		async ({ keys }) => {
			await kvm.keyboard.shortcut(...keys);
			return text(`Pressed ${keys.join("+")}`);
		},
	);

	server.tool(
		"mouse_move",
		"Move the mouse pointer to absolute screen coordinates",
		{
			x: z.number().int().describe("X coordinate in screenshot pixels"),
			y: z.number().int().describe("Y coordinate in screenshot pixels"),
		},
		async ({ x, y }) => {
			await kvm.mouse.move(x, y);
			return text(`Moved to (${x}, ${y})`);
		},
	);

	server.tool(
		"mouse_click",
		"Click at screen coordinates, or at the current pointer position when x and y are omitted",
		{
			x: z.number().int().optional().describe("X coordinate in screenshot pixels"),
			y: z.number().int().optional().describe("Y coordinate in screenshot pixels"),
			button: buttonSchema,
			double: z.boolean().optional().default(false).describe("Double click"),
		},
		async ({ x, y, button, double }) => {
			if (double) {
				await kvm.mouse.doubleClick(x, y, button);
			} else {
				await kvm.mouse.click(x, y, button);
			}
			const where = x !== undefined && y !== undefined ? ` at (${x}, ${y})` : "";
			return text(`${double ? "Double-clicked" : "Clicked"} ${button}${where}`);
		},
	);

	server.tool(
		"mouse_scroll",
		"Scroll the mouse wheel. Negative dy scrolls up.",
		{
			dx: z.number().int().optional().default(0).describe("Horizontal delta"),
			dy: z.number().int().optional().default(0).describe("Vertical delta"),
		},
		async ({ dx, dy }) => {
			await kvm.mouse.scroll(dx, dy);
			return text(`Scrolled (${dx}, ${dy})`);
		},
	);

	server.tool(
		"mouse_drag",
		"Drag from one point to another while holding a mouse button",
		{
			x1: z.number().int(),
			y1: z.number().int(),
			x2: z.number().int(),
			y2: z.number().int(),
			button: buttonSchema,
			steps: z.number().int().min(1).optional().default(1).describe("Intermediate moves"),
		},
		async ({ x1, y1, x2, y2, button, steps }) => {
			await kvm.mouse.drag(x1, y1, x2, y2, button, steps);
			return text(`Dragged from (${x1}, ${y1}) to (${x2}, ${y2})`);
		},
	);

	server.tool("atx_status", "Get the target's power and HDD LED state", {}, async () =>
		json(await kvm.atx.status()),
	);

	server.tool(
		"atx_power",
		"Operate the target's ATX buttons: 'power' (short press), 'power_long' (forced off), 'reset'",
		{
			action: z
				.enum([AtxButton.Power, AtxButton.PowerLong, AtxButton.Reset])
				.describe("Button action"),
		},
		async ({ action }) => {
			await kvm.atx.click(action);
			return text(`ATX ${action} sent`);
		},
	);

	server.tool(
		"msd_status",
		"Get virtual media state: connected image, drive mode and images in storage",
		{},
		async () => json(await kvm.msd.status()),
	);

	return server;
}
