// path: /src/code-table.ts

import { SYMBOL_COUNT } from "./frequency.ts"
import type { HuffmanNode } from "./tree.ts"

/** Code of each symbol as a string of "0" and "1"; `undefined` for symbols not in the tree */
export type CodeTable = ReadonlyArray<string | undefined>

/**
 * Assigns every leaf the path leading to it: "0" for left, "1" for right.
 * A tree that is a single leaf gives that leaf the empty code.
 */
export function buildCodeTable(root: HuffmanNode): CodeTable {
	const codes = new Array<string | undefined>(SYMBOL_COUNT).fill(undefined)

	const traverse = (node: HuffmanNode, path: string): void => {
		if (node.kind === "leaf") {
			codes[node.symbol] = path
			return
		}
		traverse(node.left, path + "0")
		traverse(node.right, path + "1")
	}

	traverse(root, "")
	return codes
}

export function isPrefixFree(codes: CodeTable): boolean {
	const present = codes.filter((code): code is string => code !== undefined).sort()

	// After sorting, a code that prefixes another sorts directly before some code it prefixes
	for (let i = 1; i < present.length; i += 1) {
		if (present[i].startsWith(present[i - 1])) return false
	}
	return true
}
