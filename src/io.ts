// path: /src/io.ts

import { closeSync, openSync, readSync, writeSync } from "node:fs"

import { HuffmanError, HuffmanInvariantError, HuffmanIoError } from "./errors.ts"

export const DEFAULT_CHUNK_SIZE = 64 * 1024

export interface ByteSource {
	/** Next byte in [0, 255], or `null` once the source is exhausted */
	readByte(): number | null
}

export interface ByteSink {
	writeByte(byte: number): void
	close(): void
}

export interface Closeable {
	close(): void
}

/**
 * Runs `use` and closes `resource` afterwards, whether `use` returned or threw
 *
 * When both `use` and `close` throw, the error from `use` propagates. A close
 * error is added to a `HuffmanError`'s `suppressed` list; any other error is
 * rethrown inside an `AggregateError` together with the close error.
 */
export function withResource<R extends Closeable, T>(resource: R, use: (resource: R) => T): T {
	let result: T
	try {
		result = use(resource)
	} catch (error) {
		try {
			resource.close()
		} catch (closeError) {
			if (!(error instanceof HuffmanError)) {
				throw new AggregateError([error, closeError], `Close failed after an error`, { cause: error })
			}
			error.suppressed.push(closeError)
		}
		throw error
	}

	resource.close()
	return result
}

// ---------- In memory ---------- //
export class BufferSource implements ByteSource {
	constructor(
		private data: Uint8Array,
		private offset: number = 0
	) {}

	public readByte(): number | null {
		if (this.offset >= this.data.length) return null
		return this.data[this.offset++]
	}

	public get position(): number {
		return this.offset
	}
}

export class BufferSink implements ByteSink {
	private buffer: number[] = []
	private closed = false

	public writeByte(byte: number): void {
		if (this.closed) throw new HuffmanInvariantError(`Write after close`)
		this.buffer.push(byte & 0xff)
	}

	public close(): void {
		this.closed = true
	}

	public get length(): number {
		return this.buffer.length
	}

	public toData(): Uint8Array {
		return new Uint8Array(this.buffer)
	}
}

// ---------- Files ---------- //
function open(path: string, flags: "r" | "w"): number {
	try {
		return openSync(path, flags)
	} catch (error) {
		throw new HuffmanIoError(`Cannot open \`${path}\``, path, { cause: error })
	}
}

function close(fd: number, path: string): void {
	try {
		closeSync(fd)
	} catch (error) {
		throw new HuffmanIoError(`Cannot close \`${path}\``, path, { cause: error })
	}
}

/**
 * Reads a file through a fixed-size chunk buffer
 */
export class FileSource implements ByteSource, Closeable {
	private fd: number | null
	private chunk: Uint8Array
	private filled = 0
	private index = 0
	private count = 0

	constructor(
		public readonly path: string,
		chunkSize: number = DEFAULT_CHUNK_SIZE
	) {
		this.chunk = new Uint8Array(chunkSize)
		this.fd = open(path, "r")
	}

	public readByte(): number | null {
		if (this.index === this.filled && !this.refill()) return null
		this.count += 1
		return this.chunk[this.index++]
	}

	/** Bytes handed out so far */
	public get bytesRead(): number {
		return this.count
	}

	public close(): void {
		if (this.fd === null) return
		const fd = this.fd
		this.fd = null
		close(fd, this.path)
	}

	private refill(): boolean {
		if (this.fd === null) return false
		try {
			this.filled = readSync(this.fd, this.chunk, 0, this.chunk.length, null)
		} catch (error) {
			throw new HuffmanIoError(`Cannot read \`${this.path}\``, this.path, { cause: error })
		}
		this.index = 0
		return this.filled > 0
	}
}

/**
 * Writes a file through a fixed-size chunk buffer. `close` flushes and may be called more than once.
 */
export class FileSink implements ByteSink {
	private fd: number | null
	private chunk: Uint8Array
	private length = 0
	private count = 0

	constructor(
		public readonly path: string,
		chunkSize: number = DEFAULT_CHUNK_SIZE
	) {
		this.chunk = new Uint8Array(chunkSize)
		this.fd = open(path, "w")
	}

	public writeByte(byte: number): void {
		if (this.fd === null) throw new HuffmanInvariantError(`Write after close`)
		this.chunk[this.length++] = byte
		this.count += 1
		if (this.length === this.chunk.length) this.flush(this.fd)
	}

	/** Bytes accepted so far, flushed or not */
	public get bytesWritten(): number {
		return this.count
	}

	public close(): void {
		if (this.fd === null) return
		const fd = this.fd
		this.fd = null
		try {
			this.flush(fd)
		} finally {
			close(fd, this.path)
		}
	}

	private flush(fd: number): void {
		let offset = 0
		try {
			while (offset < this.length) {
				offset += writeSync(fd, this.chunk, offset, this.length - offset)
			}
		} catch (error) {
			throw new HuffmanIoError(`Cannot write \`${this.path}\``, this.path, { cause: error })
		}
		this.length = 0
	}
}
