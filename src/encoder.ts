// path: /src/encoder.ts

import { BitReader, type BitWriter } from "./bits.ts"
import type { CodeTable } from "./code-table.ts"
import { HuffmanInvariantError } from "./errors.ts"
import { END_OF_STREAM, type HuffmanSymbol } from "./frequency.ts"
import type { ByteSource } from "./io.ts"

function writeCode(writer: BitWriter, codes: CodeTable, symbol: HuffmanSymbol): void {
	const code = codes[symbol]
	if (code === undefined) {
		throw new HuffmanInvariantError(`No code for symbol ${symbol}`)
	}

	for (const char of code) {
		writer.writeBit(char === "1" ? 1 : 0)
	}
}

/**
 * Writes the code of every byte in `source`, then the end-of-stream code, and closes `writer`
 *
 * @returns number of payload bits written, padding excluded
 * @throws {HuffmanInvariantError} if a byte has no code, meaning `codes` was not built from this input
 */
export function encodeData(source: ByteSource, codes: CodeTable, writer: BitWriter): number {
	const reader = new BitReader(source)
	const start = writer.bitsWritten

	for (let byte = reader.read(8); byte !== null; byte = reader.read(8)) {
		writeCode(writer, codes, byte)
	}
	writeCode(writer, codes, END_OF_STREAM)

	const bits = writer.bitsWritten - start
	writer.close()
	return bits
}
