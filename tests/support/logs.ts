import { vi } from "vitest";

/**
 * Silence console output and expose the captured lines.
 */
export function captureLogs(): { readonly out: () => string[]; readonly err: () => string[] } {
  const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(console, "table").mockImplementation(() => undefined);
  return {
    out: () => logSpy.mock.calls.map(call => String(call[0])),
    err: () => errorSpy.mock.calls.map(call => String(call[0]))
  };
}
