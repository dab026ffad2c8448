// path: /src/decoder.ts

import type { BitReader } from "./bits.ts"
import { HuffmanFormatError, HuffmanInvariantError } from "./errors.ts"
import { END_OF_STREAM } from "./frequency.ts"
import type { ByteSink } from "./io.ts"
import type { HuffmanInternal, HuffmanNode } from "./tree.ts"

/**
 * Walks the tree one bit at a time, writing each decoded byte to `sink`,
 * until the end-of-stream symbol is reached. Padding after it is never read.
 *
 * @returns number of payload bits consumed
 * @throws {HuffmanFormatError} if the input ends before the end-of-stream symbol
 */
export function decodeData(reader: BitReader, root: HuffmanNode, sink: ByteSink): number {
	const start = reader.bitsRead

	// A lone leaf has the empty code; only an end-of-stream-only table builds one
	if (root.kind === "leaf") {
		if (root.symbol !== END_OF_STREAM) {
			throw new HuffmanInvariantError(`Single-leaf tree must hold the end-of-stream symbol`)
		}
		return 0
	}

	let node: HuffmanInternal = root
	for (;;) {
		const bit = reader.readBit()
		if (bit === null) throw new HuffmanFormatError(`Unexpected end of input`)

		const next = bit === 0 ? node.left : node.right
		if (next.kind === "internal") {
			node = next
			continue
		}

		if (next.symbol === END_OF_STREAM) break
		sink.writeByte(next.symbol)
		node = root
	}

	return reader.bitsRead - start
}
