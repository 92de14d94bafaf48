#!/usr/bin/env node
// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Entry point: serves the MCP tools over Streamable HTTP, backed by one
 * client for the device named by the KVM_* environment variables.
 */

import { randomUUID } from "node:crypto";
import { type IncomingMessage, type ServerResponse, createServer } from "node:http";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { AsyncKvmClient } from "../client/async-client.js";
import { createLogger } from "../logger.js";
import { createMcpServer } from "./server.js";

const PORT = Number(process.env.PORT) || 3001;

const log = createLogger("kvmlink-mcp");

async function main(): Promise<void> {
	const kvm = new AsyncKvmClient({ logger: log });

	// Store active transports per session for proper lifecycle
	const transports = new Map<string, StreamableHTTPServerTransport>();

	async function handleMcp(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const header = req.headers["mcp-session-id"];
		const sessionId = typeof header === "string" ? header : undefined;
		const existing = sessionId ? transports.get(sessionId) : undefined;

		if (existing && (req.method === "POST" || req.method === "GET" || req.method === "DELETE")) {
			await existing.handleRequest(req, res);
			return;
		}

		if (req.method === "POST" && !sessionId) {
			// Each session gets its own McpServer instance
			const mcpServer = createMcpServer(kvm);

			const transport = new StreamableHTTPServerTransport({
				sessionIdGenerator: () => randomUUID(),
				onsessioninitialized: (sid) => {
					transports.set(sid, transport);
				},
			});

			transport.onclose = () => {
				if (transport.sessionId) {
					transports.delete(transport.sessionId);
				}
			};

			await mcpServer.connect(transport);
			await transport.handleRequest(req, res);
			return;
		}

		res.writeHead(400).end("Bad Request");
	}

	const httpServer = createServer((req, res) => {
		const path = new URL(req.url ?? "/", "http://localhost").pathname;
		if (path === "/health") {
			res.writeHead(200).end("ok");
			return;
		}
		if (path !== "/mcp") {
			res.writeHead(404).end("Not Found");
			return;
		}
		handleMcp(req, res).catch((err: unknown) => {
			log.error({ err }, "MCP request failed");
			if (!res.headersSent) {
				res.writeHead(500);
			}
			res.end();
		});
	});

	const shutdown = (): void => {
		log.info("shutting down");
		httpServer.close();
		kvm.close().then(
			() => process.exit(0),
			(err: unknown) => {
				log.error({ err }, "client close failed");
				process.exit(1);
			},
		);
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	httpServer.listen(PORT, () => {
		log.info(
			{ device: kvm.baseUrl },
			`kvmlink MCP server listening on http://localhost:${PORT}/mcp`,
		);
	});
}

main().catch((err: unknown) => {
	log.fatal({ err }, "startup failed");
	process.exit(1);
});
