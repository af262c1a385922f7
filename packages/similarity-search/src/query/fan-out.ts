/**
 * Fan-out helpers for collaborator calls
 *
 * Runs independent calls concurrently under one AbortController. Each call
 * gets its own timeout; the first failure aborts every sibling still in
 * flight, and the caller's signal aborts the whole group.
 */

import {
	CollaboratorFailureError,
	SearchCancelledError,
	isSimilaritySearchError,
} from "../errors";

// ============================================================================
// Types
// ============================================================================

export type CollaboratorCall<T> = (signal: AbortSignal) => Promise<T>;

export interface FanOutOptions {
	/** Per-call timeout in milliseconds */
	timeoutMs: number;
	/** Caller cancellation */
	signal?: AbortSignal;
}

export class CollaboratorTimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeoutMs: number,
	) {
		super(`${operation} timed out after ${timeoutMs}ms`);
		this.name = "CollaboratorTimeoutError";
	}
}

/** Rejection used for calls cut short because a sibling failed */
class SiblingAbortedError extends Error {
	constructor(operation: string) {
		super(`${operation} aborted after a sibling call failed`);
		this.name = "SiblingAbortedError";
	}
}

// ============================================================================
// Implementation
// ============================================================================

/**
 * Run `calls` concurrently and return their results in input order.
 *
 * Failures:
 * - caller signal aborted → SearchCancelledError
 * - a call threw a SimilaritySearchError → that error, unchanged
 * - anything else (including timeouts) → one CollaboratorFailureError with every cause
 */
export async function fanOut<T>(
	operation: string,
	calls: ReadonlyArray<CollaboratorCall<T>>,
	options: FanOutOptions,
): Promise<T[]> {
	const parent = options.signal;
	if (parent?.aborted) {
		throw new SearchCancelledError(parent.reason);
	}

	const group = new AbortController();
	const onParentAbort = (): void => group.abort(parent?.reason);
	parent?.addEventListener("abort", onParentAbort, { once: true });

	try {
		const settled = await Promise.allSettled(
			calls.map(async (call) => {
				try {
					return await callWithTimeout(operation, call, group.signal, options.timeoutMs);
				} catch (error) {
					if (!group.signal.aborted) group.abort(error);
					throw error;
				}
			}),
		);

		if (parent?.aborted) {
			throw new SearchCancelledError(parent.reason);
		}

		const values: T[] = [];
		const failures: unknown[] = [];
		for (const outcome of settled) {
			if (outcome.status === "fulfilled") {
				values.push(outcome.value);
			} else if (!(outcome.reason instanceof SiblingAbortedError)) {
				failures.push(outcome.reason);
			}
		}

		if (failures.length > 0) {
			const typed = failures.find(isSimilaritySearchError);
			if (typed) throw typed;
			throw new CollaboratorFailureError(operation, failures);
		}

		return values;
	} finally {
		parent?.removeEventListener("abort", onParentAbort);
	}
}

/**
 * Run one call with a timeout, rejecting early when `group` aborts.
 * The call receives its own signal, aborted on timeout or group abort.
 */
export function callWithTimeout<T>(
	operation: string,
	call: CollaboratorCall<T>,
	group: AbortSignal,
	timeoutMs: number,
): Promise<T> {
	if (group.aborted) {
		return Promise.reject(new SiblingAbortedError(operation));
	}

	const controller = new AbortController();

	return new Promise<T>((resolve, reject) => {
		let timer: ReturnType<typeof setTimeout> | undefined;

		const cleanup = (): void => {
			clearTimeout(timer);
			group.removeEventListener("abort", onGroupAbort);
		};

		const onGroupAbort = (): void => {
			cleanup();
			controller.abort(group.reason);
			reject(new SiblingAbortedError(operation));
		};

		timer = setTimeout(() => {
			cleanup();
			const timeout = new CollaboratorTimeoutError(operation, timeoutMs);
			controller.abort(timeout);
			reject(timeout);
		}, timeoutMs);
		group.addEventListener("abort", onGroupAbort, { once: true });

		Promise.resolve()
			.then(() => {
				controller.signal.throwIfAborted();
				return call(controller.signal);
			})
			.then(
				(value) => {
					cleanup();
					resolve(value);
				},
				(error: unknown) => {
					cleanup();
					reject(error);
				},
			);
	});
}
