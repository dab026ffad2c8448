// path: /src/mod.ts

/**
 * @module huffman
 *
 * Byte-oriented Huffman compression and decompression
 */

import { rmSync } from "node:fs"

import { BitReader, BitWriter } from "./bits.ts"
import { buildCodeTable } from "./code-table.ts"
import { decodeData } from "./decoder.ts"
import { encodeData } from "./encoder.ts"
import { countFrequencies, type FrequencyTable } from "./frequency.ts"
import { readHeader, writeHeader } from "./header.ts"
import {
	BufferSink,
	BufferSource,
	DEFAULT_CHUNK_SIZE,
	FileSink,
	FileSource,
	withResource,
	type ByteSink,
	type ByteSource
} from "./io.ts"
import { buildTree } from "./tree.ts"

export { HuffmanError, HuffmanFormatError, HuffmanInvariantError, HuffmanIoError } from "./errors.ts"
export { END_OF_STREAM, SYMBOL_COUNT, type FrequencyTable } from "./frequency.ts"
export { FORMAT_VERSION, HEADER_SIZE, MAGIC_BYTES } from "./header.ts"
export { BufferSink, BufferSource, FileSink, FileSource, type ByteSink, type ByteSource } from "./io.ts"

/**
 * Hands a fresh source over the whole input to `use`. Encoding scans its input twice,
 * once to count frequencies and once to encode.
 */
export type InputScanner = <T>(use: (source: ByteSource) => T) => T

export interface EncodeResult {
	table: FrequencyTable
	payloadBits: number
}

export interface CodecStats {
	inputBytes: number
	outputBytes: number
	/** Huffman-coded bits, header and padding excluded */
	payloadBits: number
}

export interface CodecOptions {
	/** Buffer size for file reads and writes (default: 64 KiB) */
	chunkSize?: number
}

// ---------- Streams ---------- //
/**
 * Writes the header and the coded payload of the input to `sink`, then closes `sink`.
 * `table` defaults to a counting pass over the input.
 */
export function encodeStream(
	scan: InputScanner,
	sink: ByteSink,
	table: FrequencyTable = scan(countFrequencies)
): EncodeResult {
	const codes = buildCodeTable(buildTree(table))

	writeHeader(table, sink)
	const payloadBits = scan((source) => encodeData(source, codes, new BitWriter(sink)))

	return { table, payloadBits }
}

/**
 * Reads a header and payload from `source`, writes the original bytes to `sink`, then closes `sink`
 *
 * @returns number of payload bits consumed
 * @throws {HuffmanFormatError} if the header is invalid or the payload ends early
 */
export function decodeStream(source: ByteSource, sink: ByteSink): number {
	const root = buildTree(readHeader(source))
	const payloadBits = decodeData(new BitReader(source), root, sink)
	sink.close()
	return payloadBits
}

// ---------- In memory ---------- //
/**
 * Compresses `data`
 *
 * @example
 * const compressed = encode(new TextEncoder().encode("abracadabra"))
 * const original = decode(compressed)
 */
export function encode(data: Uint8Array): Uint8Array {
	const sink = new BufferSink()
	encodeStream((use) => use(new BufferSource(data)), sink)
	return sink.toData()
}

/**
 * Restores data produced by `encode`
 *
 * @throws {HuffmanFormatError} if `data` is not valid compressed data
 */
export function decode(data: Uint8Array): Uint8Array {
	const sink = new BufferSink()
	decodeStream(new BufferSource(data), sink)
	return sink.toData()
}

// ---------- Files ---------- //
function chunkSizeOf(options: CodecOptions): number {
	const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new RangeError(`Invalid chunk size: ${chunkSize}`)
	}
	return chunkSize
}

/**
 * Opens `outputPath` and runs `write` against it. If anything fails, the
 * partially written file is removed before the error propagates.
 */
function writeOutput<T>(outputPath: string, chunkSize: number, write: (sink: FileSink) => T): T {
	const sink = new FileSink(outputPath, chunkSize)
	try {
		return withResource(sink, write)
	} catch (error) {
		rmSync(outputPath, { force: true })
		throw error
	}
}

/**
 * Compresses the file at `inputPath` into `outputPath`
 *
 * @throws {HuffmanIoError} if either path cannot be opened, read or written
 */
export function encodeFile(inputPath: string, outputPath: string, options: CodecOptions = {}): CodecStats {
	const chunkSize = chunkSizeOf(options)
	let inputBytes = 0

	const scan: InputScanner = (use) =>
		withResource(new FileSource(inputPath, chunkSize), (source) => {
			const result = use(source)
			inputBytes = source.bytesRead
			return result
		})

	// The input is opened and counted before the output exists
	const table = scan(countFrequencies)

	return writeOutput(outputPath, chunkSize, (sink) => {
		const { payloadBits } = encodeStream(scan, sink, table)
		return { inputBytes, outputBytes: sink.bytesWritten, payloadBits }
	})
}

/**
 * Restores the file at `inputPath`, written by `encodeFile`, into `outputPath`
 *
 * @throws {HuffmanFormatError} if the input is not a valid compressed file
 * @throws {HuffmanIoError} if either path cannot be opened, read or written
 */
export function decodeFile(inputPath: string, outputPath: string, options: CodecOptions = {}): CodecStats {
	const chunkSize = chunkSizeOf(options)

	return withResource(new FileSource(inputPath, chunkSize), (source) =>
		writeOutput(outputPath, chunkSize, (sink) => {
			const payloadBits = decodeStream(source, sink)
			return { inputBytes: source.bytesRead, outputBytes: sink.bytesWritten, payloadBits }
		})
	)
}
