/**
 * Core Utilities
 */

import { TimeoutError } from "./errors";

/**
 * Generate unique ID with optional prefix
 */
export function generateId(prefix = ""): string {
	return `${prefix}${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Sleep for the given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation with a deadline.
 *
 * The operation receives an AbortSignal that fires when the deadline passes;
 * the returned promise rejects with a TimeoutError at that moment whether or
 * not the operation honours the signal.
 */
export async function withTimeout<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	message: string
): Promise<T> {
	const controller = new AbortController();
	let timer: ReturnType<typeof setTimeout> | undefined;

	const deadline = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			const error = new TimeoutError(message, timeoutMs);
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});

	try {
		return await Promise.race([operation(controller.signal), deadline]);
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Check that a value is a plain (non-array, non-null) object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check for a missing or whitespace-only string
 */
export function isBlank(value: string | null | undefined): boolean {
	return value === undefined || value === null || value.trim().length === 0;
}
