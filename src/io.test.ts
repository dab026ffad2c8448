// path: /src/io.test.ts

import assert from "node:assert"
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import test, { after } from "node:test"

import { HuffmanFormatError, HuffmanInvariantError, HuffmanIoError } from "./errors.ts"
import { BufferSink, BufferSource, FileSink, FileSource, withResource, type ByteSource } from "./io.ts"

const dir = mkdtempSync(join(tmpdir(), "huffman-io-"))
after(() => rmSync(dir, { recursive: true, force: true }))

function drain(source: ByteSource): number[] {
	const bytes: number[] = []
	for (let byte = source.readByte(); byte !== null; byte = source.readByte()) bytes.push(byte)
	return bytes
}

test(`Buffers`, async (t) => {
	await t.test(`Source starts at its offset`, () => {
		const source = new BufferSource(new Uint8Array([1, 2, 3, 4]), 2)
		assert.deepStrictEqual(drain(source), [3, 4])
		assert.strictEqual(source.position, 4)
	})

	await t.test(`Sink collects bytes until closed`, () => {
		const sink = new BufferSink()
		sink.writeByte(0x41)
		sink.writeByte(0x142)
		sink.close()

		assert.deepStrictEqual(sink.toData(), new Uint8Array([0x41, 0x42]))
		assert.strictEqual(sink.length, 2)
		assert.throws(() => sink.writeByte(0), HuffmanInvariantError)
	})
})

test(`withResource`, async (t) => {
	await t.test(`Closes after use`, () => {
		let closed = 0
		const result = withResource({ close: () => (closed += 1) }, () => `done`)
		assert.strictEqual(result, `done`)
		assert.strictEqual(closed, 1)
	})

	await t.test(`Closes when use throws`, () => {
		let closed = 0
		assert.throws(
			() =>
				withResource({ close: () => (closed += 1) }, () => {
					throw new Error(`boom`)
				}),
			{ message: `boom` }
		)
		assert.strictEqual(closed, 1)
	})

	await t.test(`Close failure does not hide the error from use`, () => {
		const closeError = new HuffmanIoError(`Cannot write \`out.bin\``, `out.bin`)
		const failing = {
			close: () => {
				throw closeError
			}
		}

		assert.throws(
			() =>
				withResource(failing, () => {
					throw new HuffmanFormatError(`Unexpected end of input`)
				}),
			(error) => {
				assert.ok(error instanceof HuffmanFormatError)
				assert.strictEqual(error.message, `Unexpected end of input`)
				assert.deepStrictEqual(error.suppressed, [closeError])
				return true
			}
		)
	})

	await t.test(`Close failure after another error`, () => {
		const useError = new Error(`boom`)
		const closeError = new HuffmanIoError(`Cannot close \`out.bin\``, `out.bin`)

		assert.throws(
			() =>
				withResource(
					{
						close: () => {
							throw closeError
						}
					},
					() => {
						throw useError
					}
				),
			(error) => {
				assert.ok(error instanceof AggregateError)
				assert.deepStrictEqual(error.errors, [useError, closeError])
				assert.strictEqual(error.cause, useError)
				return true
			}
		)
	})

	await t.test(`Close failure after success propagates`, () => {
		const closeError = new HuffmanIoError(`Cannot close \`out.bin\``, `out.bin`)
		assert.throws(
			() =>
				withResource(
					{
						close: () => {
							throw closeError
						}
					},
					() => `done`
				),
			(error) => error === closeError
		)
	})
})

test(`Files`, async (t) => {
	await t.test(`Chunked write and read`, () => {
		const path = join(dir, `chunks.bin`)
		const bytes = Array.from({ length: 10 }, (_, i) => i * 25)

		const sink = new FileSink(path, 3)
		for (const byte of bytes) sink.writeByte(byte)
		assert.strictEqual(sink.bytesWritten, 10)
		sink.close()
		sink.close()

		assert.deepStrictEqual(new Uint8Array(readFileSync(path)), new Uint8Array(bytes))

		const read = withResource(new FileSource(path, 4), (source) => {
			const result = drain(source)
			assert.strictEqual(source.bytesRead, 10)
			return result
		})
		assert.deepStrictEqual(read, bytes)
	})

	await t.test(`Empty file`, () => {
		const path = join(dir, `empty.bin`)
		writeFileSync(path, new Uint8Array([]))
		assert.deepStrictEqual(withResource(new FileSource(path), drain), [])
	})

	await t.test(`Missing file`, () => {
		const path = join(dir, `missing`, `nothing.bin`)
		assert.throws(
			() => new FileSource(path),
			(error) => {
				assert.ok(error instanceof HuffmanIoError)
				assert.strictEqual(error.path, path)
				assert.strictEqual(error.message, `Cannot open \`${path}\``)
				assert.ok(error.cause instanceof Error)
				return true
			}
		)
		assert.throws(() => new FileSink(path), HuffmanIoError)
	})

	await t.test(`Write after close`, () => {
		const sink = new FileSink(join(dir, `closed.bin`))
		sink.close()
		assert.throws(() => sink.writeByte(1), HuffmanInvariantError)
	})
})
