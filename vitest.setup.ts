import { afterEach, vi } from "vitest";

// Tests spy on console.warn to check rate-limited logging; never leak a spy.
afterEach(() => {
  vi.restoreAllMocks();
});
