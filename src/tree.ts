// path: /src/tree.ts

import { HuffmanInvariantError } from "./errors.ts"
import type { FrequencyTable, HuffmanSymbol } from "./frequency.ts"

export interface HuffmanLeaf {
	readonly kind: "leaf"
	readonly symbol: HuffmanSymbol
	readonly count: number
}

export interface HuffmanInternal {
	readonly kind: "internal"
	readonly count: number
	readonly left: HuffmanNode
	readonly right: HuffmanNode
}

export type HuffmanNode = HuffmanLeaf | HuffmanInternal

interface QueueEntry {
	node: HuffmanNode
	seq: number
}

/**
 * Binary min-heap ordered by count, then by insertion order
 */
class NodeQueue {
	private heap: QueueEntry[] = []
	private seqCounter = 0

	public get size(): number {
		return this.heap.length
	}

	public push(node: HuffmanNode): void {
		this.heap.push({ node, seq: this.seqCounter++ })
		this.siftUp(this.heap.length - 1)
	}

	public pop(): HuffmanNode {
		const top = this.heap[0]
		const last = this.heap.pop()
		if (top === undefined || last === undefined) {
			throw new HuffmanInvariantError(`Pop from an empty queue`)
		}

		if (this.heap.length > 0) {
			this.heap[0] = last
			this.siftDown(0)
		}
		return top.node
	}

	private less(a: QueueEntry, b: QueueEntry): boolean {
		if (a.node.count !== b.node.count) return a.node.count < b.node.count
		return a.seq < b.seq
	}

	private siftUp(index: number): void {
		while (index > 0) {
			const parent = (index - 1) >> 1
			if (!this.less(this.heap[index], this.heap[parent])) return
			this.swap(index, parent)
			index = parent
		}
	}

	private siftDown(index: number): void {
		for (;;) {
			const left = 2 * index + 1
			const right = left + 1
			let smallest = index

			if (left < this.heap.length && this.less(this.heap[left], this.heap[smallest])) smallest = left
			if (right < this.heap.length && this.less(this.heap[right], this.heap[smallest])) smallest = right
			if (smallest === index) return

			this.swap(index, smallest)
			index = smallest
		}
	}

	private swap(i: number, j: number): void {
		const tmp = this.heap[i]
		this.heap[i] = this.heap[j]
		this.heap[j] = tmp
	}
}

/**
 * Builds the Huffman tree for a frequency table
 *
 * Leaves are queued in ascending symbol order. The two lightest nodes are merged
 * repeatedly, the first one removed becoming the left child. Equal counts are
 * removed in insertion order, so the same table always yields the same tree.
 *
 * @throws {HuffmanInvariantError} if no symbol has a non-zero count
 */
export function buildTree(table: FrequencyTable): HuffmanNode {
	const queue = new NodeQueue()

	table.forEach((count, symbol) => {
		if (count > 0) queue.push({ kind: "leaf", symbol, count })
	})

	if (queue.size === 0) {
		throw new HuffmanInvariantError(`Cannot build a tree from an all-zero frequency table`)
	}

	while (queue.size > 1) {
		const left = queue.pop()
		const right = queue.pop()
		queue.push({ kind: "internal", count: left.count + right.count, left, right })
	}

	return queue.pop()
}
