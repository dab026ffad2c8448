// path: /src/errors.ts

export class HuffmanError extends Error {
	/** Errors raised while cleaning up after this one */
	public readonly suppressed: unknown[] = []

	constructor(message: string, options?: ErrorOptions) {
		super(message, options)
		this.name = "HuffmanError"
	}
}

/** The input is not a file this codec version wrote */
export class HuffmanFormatError extends HuffmanError {
	constructor(message: string) {
		super(message)
		this.name = "HuffmanFormatError"
	}
}

/** A path could not be opened, or a read or write on it failed */
export class HuffmanIoError extends HuffmanError {
	constructor(
		message: string,
		public readonly path: string,
		options?: ErrorOptions
	) {
		super(message, options)
		this.name = "HuffmanIoError"
	}
}

/** A logic defect; never caused by bad input */
export class HuffmanInvariantError extends HuffmanError {
	constructor(message: string) {
		super(message)
		this.name = "HuffmanInvariantError"
	}
}
