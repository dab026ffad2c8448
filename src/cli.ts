// path: /src/cli.ts
// huffman encode <input> <output>   -> compress a file
// huffman decode <input> <output>   -> restore a compressed file
//
// Set HUFFMAN_QUIET=1 to drop the byte counts.

import { pathToFileURL } from "node:url"

import { HuffmanError, decodeFile, encodeFile, type CodecStats } from "./mod.ts"

const USAGE = "usage: huffman <encode|decode> <input> <output>"

interface ParsedArgs {
	command: "encode" | "decode"
	input: string
	output: string
}

function parseArgs(args: string[]): ParsedArgs | null {
	if (args.length !== 3) return null
	const [command, input, output] = args
	if (command !== "encode" && command !== "decode") return null
	return { command, input, output }
}

function report(command: ParsedArgs["command"], stats: CodecStats): void {
	console.log(`Number of bytes in input: ${stats.inputBytes}`)
	if (command === "encode") {
		console.log(`Number of bytes in payload: ${Math.round(stats.payloadBits / 8)}`)
	}
	console.log(`Number of bytes in output: ${stats.outputBytes}`)
}

/**
 * Runs one command and returns the process exit code:
 * 0 on success, 1 on an I/O or format error, 2 on bad usage
 */
export function main(args: string[], env: NodeJS.ProcessEnv = process.env): number {
	const parsed = parseArgs(args)
	if (parsed === null) {
		console.error(USAGE)
		return 2
	}

	const quiet = env.HUFFMAN_QUIET === "1"
	if (!quiet) console.log(`\n${parsed.command === "encode" ? "Encoding" : "Decoding"} ${parsed.input} ${parsed.output}`)

	try {
		const run = parsed.command === "encode" ? encodeFile : decodeFile
		const stats = run(parsed.input, parsed.output)
		if (!quiet) report(parsed.command, stats)
		return 0
	} catch (err) {
		if (!(err instanceof HuffmanError)) throw err
		console.error(`${err.name}: ${err.message}`)
		return 1
	}
}

if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
	process.exitCode = main(process.argv.slice(2))
}
