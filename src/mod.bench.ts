// path: /src/mod.bench.ts

import { performance } from "node:perf_hooks"

import { noise } from "./fixtures.ts"
import { decode, encode } from "./mod.ts"

const NOISE_DATA = noise(1 << 20)
const NOISE_COMPRESSED = encode(NOISE_DATA)

function bench(name: string, fn: () => void, runs: number = 10): void {
	fn()
	const start = performance.now()
	for (let i = 0; i < runs; i += 1) fn()
	console.log(`${name}: ${((performance.now() - start) / runs).toFixed(2)} ms/run`)
}

bench("Compress 1 MiB of noise", () => {
	encode(NOISE_DATA)
})

bench("Decompress 1 MiB of noise", () => {
	decode(NOISE_COMPRESSED)
})
