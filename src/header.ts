// path: /src/header.ts

/**
 * Compressed file header
 *
 * Format version 1, integers big-endian:
 * - bytes 0-3: magic `"HUF\0"`
 * - byte 4: format version
 * - bytes 5-1032: 257 unsigned 32-bit counts, symbol 0 first
 *
 * The Huffman-coded payload follows immediately.
 */

import { HuffmanFormatError, HuffmanInvariantError } from "./errors.ts"
import { END_OF_STREAM, SYMBOL_COUNT, type FrequencyTable } from "./frequency.ts"
import type { ByteSink, ByteSource } from "./io.ts"

export const MAGIC_BYTES = new Uint8Array([0x48, 0x55, 0x46, 0x00])
export const FORMAT_VERSION = 1
export const HEADER_SIZE = MAGIC_BYTES.length + 1 + SYMBOL_COUNT * 4

const MAX_COUNT = 0xffffffff

export function writeHeader(table: FrequencyTable, sink: ByteSink): void {
	if (table.length !== SYMBOL_COUNT) {
		throw new HuffmanInvariantError(`Frequency table must have ${SYMBOL_COUNT} entries, got ${table.length}`)
	}

	for (const byte of MAGIC_BYTES) sink.writeByte(byte)
	sink.writeByte(FORMAT_VERSION)

	for (const count of table) {
		if (!Number.isInteger(count) || count < 0 || count > MAX_COUNT) {
			throw new HuffmanInvariantError(`Frequency ${count} does not fit the header`)
		}
		sink.writeByte((count >>> 24) & 0xff)
		sink.writeByte((count >>> 16) & 0xff)
		sink.writeByte((count >>> 8) & 0xff)
		sink.writeByte(count & 0xff)
	}
}

/**
 * Reads and validates a header, leaving `source` at the first payload byte
 *
 * @throws {HuffmanFormatError} if the header is truncated, has the wrong magic
 * or version, or its end-of-stream count is not 1
 */
export function readHeader(source: ByteSource): FrequencyTable {
	const next = (): number => {
		const byte = source.readByte()
		if (byte === null) throw new HuffmanFormatError(`Invalid Huffman data: truncated header`)
		return byte
	}

	for (const expected of MAGIC_BYTES) {
		if (next() !== expected) {
			throw new HuffmanFormatError(`Invalid Huffman data: magic bytes mismatch`)
		}
	}

	const version = next()
	if (version !== FORMAT_VERSION) {
		throw new HuffmanFormatError(`Unsupported format version: ${version}`)
	}

	const table: number[] = []
	for (let symbol = 0; symbol < SYMBOL_COUNT; symbol += 1) {
		// Multiply instead of shifting so counts above 2^31 stay positive
		table.push(next() * 0x1000000 + ((next() << 16) | (next() << 8) | next()))
	}

	if (table[END_OF_STREAM] !== 1) {
		throw new HuffmanFormatError(
			`Invalid Huffman data: end-of-stream count must be 1, got ${table[END_OF_STREAM]}`
		)
	}

	return table
}
