/**
 * Test Setup
 *
 * Imported by vitest.config.ts as a setup file.
 */

import { afterEach, vi } from "vitest";

// Tests that fake timers or stub globals must not leak them into the next file
afterEach(() => {
	vi.useRealTimers();
	vi.unstubAllGlobals();
});
