// path: /src/bits.test.ts

import assert from "node:assert"
import test from "node:test"

import { BitReader, BitWriter, type Bit } from "./bits.ts"
import { HuffmanInvariantError } from "./errors.ts"
import { BufferSink, BufferSource } from "./io.ts"

const WRITE_CASES: { name: string; bits: Bit[]; bytes: number[] }[] = [
	{ name: `Nothing written`, bits: [], bytes: [] },
	{ name: `Partial byte is padded on the low end`, bits: [1, 0, 1], bytes: [0xa0] },
	{ name: `Full byte`, bits: [0, 1, 0, 0, 0, 0, 0, 1], bytes: [0x41] },
	{ name: `Full byte then one bit`, bits: [1, 1, 1, 1, 1, 1, 1, 1, 1], bytes: [0xff, 0x80] }
]

test(`BitWriter`, async (t) => {
	for (const { name, bits, bytes } of WRITE_CASES) {
		await t.test(name, () => {
			const sink = new BufferSink()
			const writer = new BitWriter(sink)
			for (const bit of bits) writer.writeBit(bit)
			writer.close()

			assert.deepStrictEqual(sink.toData(), new Uint8Array(bytes))
			assert.strictEqual(writer.bitsWritten, bits.length)
		})
	}

	await t.test(`Closing closes the sink`, () => {
		const sink = new BufferSink()
		new BitWriter(sink).close()
		assert.throws(() => sink.writeByte(0), HuffmanInvariantError)
	})

	await t.test(`Closing twice fails`, () => {
		const writer = new BitWriter(new BufferSink())
		writer.close()
		assert.throws(() => writer.close(), HuffmanInvariantError)
		assert.throws(() => writer.writeBit(1), HuffmanInvariantError)
	})
})

test(`BitReader`, async (t) => {
	await t.test(`Bits come out MSB first`, () => {
		const reader = new BitReader(new BufferSource(new Uint8Array([0xa5])))
		const bits: (Bit | null)[] = []
		for (let i = 0; i < 9; i += 1) bits.push(reader.readBit())

		assert.deepStrictEqual(bits, [1, 0, 1, 0, 0, 1, 0, 1, null])
		assert.strictEqual(reader.bitsRead, 8)
	})

	await t.test(`Whole bytes`, () => {
		const reader = new BitReader(new BufferSource(new Uint8Array([0x41, 0x42])))
		assert.strictEqual(reader.read(8), 0x41)
		assert.strictEqual(reader.read(8), 0x42)
		assert.strictEqual(reader.read(8), null)
	})

	await t.test(`Partial group at the end is end of input`, () => {
		const reader = new BitReader(new BufferSource(new Uint8Array([0xff])))
		assert.strictEqual(reader.readBit(), 1)
		assert.strictEqual(reader.read(8), null)
	})

	await t.test(`32-bit reads stay unsigned`, () => {
		const reader = new BitReader(new BufferSource(new Uint8Array([0xff, 0xff, 0xff, 0xff])))
		assert.strictEqual(reader.read(32), 0xffffffff)
	})

	await t.test(`Invalid bit count`, () => {
		const reader = new BitReader(new BufferSource(new Uint8Array([0])))
		assert.throws(() => reader.read(0), { name: "HuffmanInvariantError", message: "Invalid bit count: 0" })
		assert.throws(() => reader.read(33), { name: "HuffmanInvariantError", message: "Invalid bit count: 33" })
	})

	await t.test(`Reads what the writer wrote`, () => {
		const sink = new BufferSink()
		const writer = new BitWriter(sink)
		const bits: Bit[] = [1, 1, 0, 1, 0, 0, 0, 1, 1, 0, 1]
		for (const bit of bits) writer.writeBit(bit)
		writer.close()

		const reader = new BitReader(new BufferSource(sink.toData()))
		const read: (Bit | null)[] = []
		for (let i = 0; i < 16; i += 1) read.push(reader.readBit())

		assert.deepStrictEqual(read, [...bits, 0, 0, 0, 0, 0])
		assert.strictEqual(reader.readBit(), null)
	})
})
