// path: /src/bits.ts

import { HuffmanInvariantError } from "./errors.ts"
import type { ByteSink, ByteSource } from "./io.ts"

export type Bit = 0 | 1

/**
 * Packs bits MSB first into bytes and hands each full byte to a sink
 */
export class BitWriter {
	private currentByte: number = 0
	private bitsFilled: number = 0
	private total: number = 0
	private closed: boolean = false

	constructor(private sink: ByteSink) {}

	public writeBit(bit: Bit): void {
		if (this.closed) throw new HuffmanInvariantError(`Bit written after close`)

		this.currentByte = (this.currentByte << 1) | bit
		this.bitsFilled += 1
		this.total += 1

		if (this.bitsFilled === 8) {
			this.sink.writeByte(this.currentByte)
			this.currentByte = 0
			this.bitsFilled = 0
		}
	}

	public get bitsWritten(): number {
		return this.total
	}

	/**
	 * Pads the pending partial byte with zeros on the low end, emits it and closes the sink.
	 * Must be called exactly once.
	 */
	public close(): void {
		if (this.closed) throw new HuffmanInvariantError(`BitWriter closed twice`)
		this.closed = true

		if (this.bitsFilled > 0) {
			this.sink.writeByte(this.currentByte << (8 - this.bitsFilled))
			this.currentByte = 0
			this.bitsFilled = 0
		}
		this.sink.close()
	}
}

/**
 * Reads bits MSB first, pulling a byte from the source only once the previous one is used up
 */
export class BitReader {
	private currentByte: number = 0
	private bitsLeft: number = 0
	private total: number = 0

	constructor(private source: ByteSource) {}

	/** Next bit, or `null` at end of input */
	public readBit(): Bit | null {
		if (this.bitsLeft === 0) {
			const byte = this.source.readByte()
			if (byte === null) return null
			this.currentByte = byte
			this.bitsLeft = 8
		}

		this.bitsLeft -= 1
		this.total += 1
		return ((this.currentByte >> this.bitsLeft) & 1) === 1 ? 1 : 0
	}

	/**
	 * Reads `bitCount` bits as one MSB-first value.
	 * Returns `null` if the input ends first; the bits of that partial group are dropped.
	 */
	public read(bitCount: number): number | null {
		if (bitCount <= 0 || bitCount > 32) {
			throw new HuffmanInvariantError(`Invalid bit count: ${bitCount}`)
		}

		let result = 0
		for (let i = 0; i < bitCount; i += 1) {
			const bit = this.readBit()
			if (bit === null) return null
			result = (result << 1) | bit
		}

		return result >>> 0
	}

	public get bitsRead(): number {
		return this.total
	}
}
