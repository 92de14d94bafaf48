// SPDX-License-Identifier: Apache-2.0
// SPDX-FileCopyrightText: 2025 ovh-ikvm-mcp contributors

/**
 * FIFO async mutex. Waiters are granted the lock in the order they asked,
 * so callers that serialize through it keep their issue order.
 */
export class Mutex {
	private locked = false;
	private readonly waiters: Array<(release: () => void) => void> = [];

	async acquire(): Promise<() => void> {
		if (!this.locked) {
			this.locked = true;
			return () => this.release();
		}

		return new Promise<() => void>((resolve) => {
			this.waiters.push(resolve);
		});
	}

	private release(): void {
		const next = this.waiters.shift();
		if (next) {
			// still locked, ownership moves to the next waiter
			next(() => this.release());
			return;
		}
		this.locked = false;
	}

	async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
		const release = await this.acquire();
		try {
			return await fn();
		} finally {
			release();
		}
	}
}
