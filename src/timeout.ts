/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * A cooperative cancellation point. Algorithms poll `isValid()` at a fixed
 * granularity and fall back to a whole-range result once it returns false.
 */
export interface ITimeout {
	isValid(): boolean;
}

/**
 * A timeout that never expires.
 */
export class InfiniteTimeout implements ITimeout {
	public static readonly instance = new InfiniteTimeout();

	isValid(): boolean {
		return true;
	}
}

/**
 * A wall-clock timeout measured from construction.
 * Once expired it stays expired, even if the clock is adjusted.
 */
export class DateTimeout implements ITimeout {
	private readonly startTime = Date.now();
	private valid = true;

	constructor(private readonly timeoutMs: number) {
		if (!(timeoutMs > 0)) {
			throw new Error(`[DateTimeout] Timeout must be a positive number of milliseconds, got ${timeoutMs}.`);
		}
	}

	isValid(): boolean {
		if (this.valid && Date.now() - this.startTime >= this.timeoutMs) {
			this.valid = false;
		}
		return this.valid;
	}
}

/**
 * Maps a millisecond budget to a timeout; 0 means unbounded.
 */
export function timeoutFromMs(timeoutMs: number): ITimeout {
	if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
		throw new Error(`[timeoutFromMs] Expected a non-negative timeout, got ${timeoutMs}.`);
	}
	return timeoutMs === 0 ? InfiniteTimeout.instance : new DateTimeout(timeoutMs);
}
