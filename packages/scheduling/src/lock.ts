/**
 * In-process keyed mutex.
 *
 * Work queued under the same key runs one at a time, in arrival order.
 * Different keys never wait on each other. This only serializes callers that
 * share the process; stores shared between processes supply their own SlotLock.
 */

import type { SlotLock } from './types.js';

export function createKeyedLock(): SlotLock & { pendingKeys: () => string[] } {
	const tails = new Map<string, Promise<void>>();

	async function withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = tails.get(key) ?? Promise.resolve();
		const current = previous.then(fn);
		// The caller observes failures through `current`; the tail only orders work
		const tail = current.then(
			() => undefined,
			() => undefined,
		);
		tails.set(key, tail);

		try {
			return await current;
		} finally {
			if (tails.get(key) === tail) {
				tails.delete(key);
			}
		}
	}

	return {
		withLock,
		pendingKeys: () => Array.from(tails.keys()),
	};
}
