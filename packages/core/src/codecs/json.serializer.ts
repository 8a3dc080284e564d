/**
 * JSON Serializer
 *
 * Encodes message payloads and decodes consumed payloads. Strings pass
 * through unchanged; everything else is serialized as JSON.
 */

export interface JsonSerializerOptions {
	/**
	 * Drop object properties whose value is null.
	 * @default true
	 */
	omitNull?: boolean;

	/**
	 * Custom replacer for JSON.stringify(), applied after null filtering.
	 *
	 * @example Serialize dates as epoch milliseconds
	 * ```typescript
	 * produce(order).withJsonOptions({
	 *   replacer: (key, value) => (typeof value === "string" && key === "createdAt" ? Date.parse(value) : value),
	 * });
	 * ```
	 */
	replacer?: (key: string, value: unknown) => unknown;

	/** Indentation for pretty-printing */
	space?: string | number;
}

/**
 * Encoding or decoding a payload failed
 */
export class SerializationError extends Error {
	constructor(
		message: string,
		public readonly operation: "encode" | "decode",
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "SerializationError";
	}
}

export class JsonSerializer {
	private readonly omitNull: boolean;
	private readonly replacer?: (key: string, value: unknown) => unknown;
	private readonly space?: string | number;

	constructor(options: JsonSerializerOptions = {}) {
		this.omitNull = options.omitNull ?? true;
		this.replacer = options.replacer;
		this.space = options.space;
	}

	/**
	 * Encode a payload. Strings are returned as-is.
	 */
	encode(value: unknown): string {
		if (typeof value === "string") {
			return value;
		}
		let encoded: string | undefined;
		try {
			encoded = JSON.stringify(value, (key, current: unknown) => this.replace(key, current), this.space);
		} catch (error) {
			throw new SerializationError(
				`Failed to serialize payload: ${error instanceof Error ? error.message : String(error)}`,
				"encode",
				{ cause: error }
			);
		}
		if (encoded === undefined) {
			throw new SerializationError(`Payload of type ${typeof value} cannot be serialized to JSON`, "encode");
		}
		return encoded;
	}

	/**
	 * Decode a payload, returning the raw text when it is not JSON
	 */
	decode(text: string): unknown {
		try {
			return JSON.parse(text);
		} catch {
			return text;
		}
	}

	private replace(key: string, value: unknown): unknown {
		if (this.omitNull && key !== "" && value === null) {
			return undefined;
		}
		return this.replacer ? this.replacer(key, value) : value;
	}
}

/**
 * Serializer used when a step sets no JSON options.
 */
export const defaultJsonSerializer = new JsonSerializer();
