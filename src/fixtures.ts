// path: /src/fixtures.ts

export const TEXT_DATA = new TextEncoder().encode("abracadabra")

/**
 * `TEXT_DATA` compressed, payload only: codes a=0 b=101 r=110 c=1110 d=1111, end-of-stream=100
 */
export const TEXT_PAYLOAD = new Uint8Array([0x5c, 0xe7, 0xae, 0x40])

/** Every byte value, value `i` repeated `i % 7 + 1` times */
export const ALL_BYTES_DATA = new Uint8Array(
	Array.from({ length: 256 }, (_, i) => new Array<number>((i % 7) + 1).fill(i)).flat()
)

/** Deterministic pseudo-random bytes from a linear congruential generator */
export function noise(length: number, seed: number = 1): Uint8Array {
	const data = new Uint8Array(length)
	let state = seed >>> 0
	for (let i = 0; i < length; i += 1) {
		state = (Math.imul(state, 1664525) + 1013904223) >>> 0
		data[i] = state >>> 24
	}
	return data
}
