/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

/**
 * Assigns collision-free integer ids to strings, densely and in order of
 * first appearance. Comparing ids is much cheaper than comparing line text.
 *
 * One table is created per diff computation and shared by both sides,
 * so equal lines on either side receive the same id.
 *
 * @example
 * ```typescript
 * const table = new PerfectHashTable();
 * table.getOrCreate('foo'); // 0
 * table.getOrCreate('bar'); // 1
 * table.getOrCreate('foo'); // 0
 * ```
 */
export class PerfectHashTable {
	private readonly tokenMap = new Map<string, number>();
	private readonly idToString: string[] = [];

	/**
	 * Returns the id previously assigned to `text`, or assigns the next free one.
	 */
	public getOrCreate(text: string): number {
		let id = this.tokenMap.get(text);
		if (id === undefined) {
			id = this.idToString.length;
			this.tokenMap.set(text, id);
			this.idToString.push(text);
		}
		return id;
	}

	/**
	 * Hashes every entry of `tokens` into a dense id array.
	 */
	public hashAll(tokens: readonly string[]): Uint32Array {
		const hashed = new Uint32Array(tokens.length);
		for (let i = 0; i < tokens.length; i++) {
			hashed[i] = this.getOrCreate(tokens[i]);
		}
		return hashed;
	}

	/** The text an id was assigned to. */
	public getText(id: number): string | undefined {
		return this.idToString[id];
	}

	/** The number of distinct strings seen so far. */
	get size(): number {
		return this.idToString.length;
	}
}
