// CHANGE: Validate subscription resolution and its degraded outcomes.
// WHY: A broken subscription must contribute nothing instead of failing the run.

import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveSubscription } from "../src/api.js";
import { httpClient, type RetryPolicy } from "../src/utils/http.js";
import { captureLogs } from "./support/logs.js";
import { okResponse, statusError } from "./support/http.js";

const policy: RetryPolicy = { attempts: 3, delayMs: 0, timeoutMs: 1000 };

describe("resolveSubscription", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the plugins array with opaque fields intact", async () => {
    captureLogs();
    vi.spyOn(httpClient, "get").mockResolvedValueOnce(
      okResponse({
        desc: "upstream",
        plugins: [
          { name: "Alpha", url: "https://example.com/alpha.js", version: "1.2.0" },
          { name: "Beta", url: "https://example.com/beta.js", tags: ["a", "b"] }
        ]
      })
    );

    const plugins = await resolveSubscription("https://example.com/sub.json", policy);

    expect(plugins).toEqual([
      { name: "Alpha", url: "https://example.com/alpha.js", version: "1.2.0" },
      { name: "Beta", url: "https://example.com/beta.js", tags: ["a", "b"] }
    ]);
  });

  it("treats a missing plugins key as an empty list", async () => {
    captureLogs();
    const spy = vi.spyOn(httpClient, "get").mockResolvedValueOnce(okResponse({ desc: "nothing here" }));

    const plugins = await resolveSubscription("https://example.com/sub.json", policy);

    expect(plugins).toEqual([]);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("returns an empty list once retries are exhausted", async () => {
    const logs = captureLogs();
    const spy = vi.spyOn(httpClient, "get").mockRejectedValue(statusError(503, "Service Unavailable"));

    const plugins = await resolveSubscription("https://example.com/down.json", policy);

    expect(plugins).toEqual([]);
    expect(spy).toHaveBeenCalledTimes(3);
    expect(logs.err().at(-1)).toContain(
      "[ERROR] Subscription https://example.com/down.json failed (attempt 3/3): HTTP 503 Service Unavailable"
    );
  });

  it("retries when the body is not a JSON object", async () => {
    captureLogs();
    const spy = vi.spyOn(httpClient, "get");
    spy.mockResolvedValueOnce(okResponse("<!doctype html>"));
    spy.mockResolvedValueOnce(okResponse({ plugins: [{ name: "Gamma", url: "https://example.com/gamma.js" }] }));

    const plugins = await resolveSubscription("https://example.com/flaky.json", policy);

    expect(plugins).toEqual([{ name: "Gamma", url: "https://example.com/gamma.js" }]);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("skips entries without a string url", async () => {
    const logs = captureLogs();
    vi.spyOn(httpClient, "get").mockResolvedValueOnce(
      okResponse({
        plugins: [{ name: "No URL" }, "junk", { name: "Kept", url: "https://example.com/kept.js" }, { name: 7, url: "x" }]
      })
    );

    const plugins = await resolveSubscription("https://example.com/mixed.json", policy);

    expect(plugins).toEqual([{ name: "Kept", url: "https://example.com/kept.js" }]);
    expect(logs.err()).toHaveLength(3);
    expect(logs.err()[0]).toContain("Skipping entry 0 of https://example.com/mixed.json");
  });
});
