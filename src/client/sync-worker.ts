// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * Worker thread behind the blocking client. Hosts one AsyncKvmClient per
 * blocking client and runs operations on it while the caller's thread waits.
 * Errors come back as data so the caller can revive the original class.
 */

import { runAsWorker } from "synckit";
import { type SerializedKvmError, serializeError } from "../errors.js";
import type { KvmClientOptions } from "../kvm/types.js";
import { AsyncKvmClient } from "./async-client.js";
import {
	type OperationArgs,
	type OperationName,
	type OperationResults,
	dispatch,
} from "./operations.js";

/** Options that survive structured clone (no logger). */
export type WorkerClientOptions = Omit<KvmClientOptions, "logger">;

export type WorkerRequest =
	| { readonly kind: "open"; readonly clientId: number; readonly options: WorkerClientOptions }
	| {
			readonly kind: "call";
			readonly clientId: number;
			readonly name: OperationName;
			readonly args: OperationArgs[OperationName];
	  }
	| { readonly kind: "close"; readonly clientId: number };

export type WorkerResponse =
	| { readonly ok: true; readonly value: OperationResults[OperationName] | undefined }
	| { readonly ok: false; readonly error: SerializedKvmError };

const clients = new Map<number, AsyncKvmClient>();

export async function handle(request: WorkerRequest): Promise<WorkerResponse> {
	try {
		switch (request.kind) {
			case "open": {
				if (!clients.has(request.clientId)) {
					clients.set(request.clientId, new AsyncKvmClient(request.options));
				}
				return { ok: true, value: undefined };
			}
			case "call": {
				const client = clients.get(request.clientId);
				if (!client) {
					throw new Error(`No client with id ${request.clientId} in worker`);
				}
				return { ok: true, value: await dispatch(client, request.name, request.args) };
			}
			case "close": {
				const client = clients.get(request.clientId);
				clients.delete(request.clientId);
				await client?.close();
				return { ok: true, value: undefined };
			}
		}
	} catch (err) {
		return { ok: false, error: serializeError(err) };
	}
}

runAsWorker(handle);
