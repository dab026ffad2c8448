// path: /src/frequency.ts

import { BitReader } from "./bits.ts"
import type { ByteSource } from "./io.ts"

/** 256 byte values plus the end-of-stream marker */
export const SYMBOL_COUNT = 257
export const END_OF_STREAM = 256

/** Integer in [0, 256]; 256 is `END_OF_STREAM` */
export type HuffmanSymbol = number

/** Occurrence count per symbol, always `SYMBOL_COUNT` entries */
export type FrequencyTable = readonly number[]

/**
 * Counts every byte of `source`. Bytes are read as 8-bit groups; a trailing
 * partial group counts as end of input. The end-of-stream count is always 1.
 *
 * @example
 * const table = countFrequencies(new BufferSource(new Uint8Array([0x41, 0x41, 0x42])))
 * // table[0x41] === 2, table[0x42] === 1, table[256] === 1
 */
export function countFrequencies(source: ByteSource): FrequencyTable {
	const table = new Array<number>(SYMBOL_COUNT).fill(0)
	const reader = new BitReader(source)

	for (let byte = reader.read(8); byte !== null; byte = reader.read(8)) {
		table[byte] += 1
	}

	table[END_OF_STREAM] = 1
	return table
}
