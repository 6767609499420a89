import { beforeEach, describe, expect, it, vi } from "vitest";
import { fetchJsonWithTimeout, resolveRedirect, sanitizeUrlForLogs, type FetchFn } from "../src/catalog/http";
import { AuthError, NetworkError, NotFoundError } from "../src/lib/errors";

function jsonResponse(payload: unknown, status = 200) {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json",
    },
  });
}

function stubFetch(...responses: Array<Response | Error>) {
  const fetchImpl = vi.fn();
  for (const response of responses) {
    if (response instanceof Error) {
      fetchImpl.mockRejectedValueOnce(response);
    } else {
      fetchImpl.mockResolvedValueOnce(response);
    }
  }
  return fetchImpl;
}

describe("catalog http", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("returns the parsed body of a successful response", async () => {
    const fetchImpl = stubFetch(jsonResponse({ id: "t1" }));

    const payload = await fetchJsonWithTimeout("https://api.test/x", {}, {
      fetchImpl: fetchImpl as unknown as FetchFn,
    });

    expect(payload).toEqual({ id: "t1" });
  });

  it("returns null for an empty response", async () => {
    const fetchImpl = stubFetch(new Response(null, { status: 204 }));

    const payload = await fetchJsonWithTimeout("https://api.test/x", {}, {
      fetchImpl: fetchImpl as unknown as FetchFn,
    });

    expect(payload).toBeNull();
  });

  it("does not retry a missing entity", async () => {
    const fetchImpl = stubFetch(jsonResponse({ error: "missing" }, 404));

    await expect(
      fetchJsonWithTimeout("https://api.test/x", {}, { fetchImpl: fetchImpl as unknown as FetchFn, retryDelayMs: 0 }),
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("maps refused requests to auth errors", async () => {
    const fetchImpl = stubFetch(jsonResponse({ error: "expired" }, 401));

    await expect(
      fetchJsonWithTimeout("https://api.test/x", {}, { fetchImpl: fetchImpl as unknown as FetchFn }),
    ).rejects.toBeInstanceOf(AuthError);
  });

  it("retries server errors until one succeeds", async () => {
    const fetchImpl = stubFetch(jsonResponse({}, 500), jsonResponse({ ok: true }));

    const payload = await fetchJsonWithTimeout("https://api.test/x", {}, {
      fetchImpl: fetchImpl as unknown as FetchFn,
      retryDelayMs: 0,
    });

    expect(payload).toEqual({ ok: true });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("gives up with the last status once retries run out", async () => {
    const fetchImpl = stubFetch(jsonResponse({}, 503), jsonResponse({}, 503));

    const failure = fetchJsonWithTimeout("https://api.test/x", {}, {
      fetchImpl: fetchImpl as unknown as FetchFn,
      retries: 1,
      retryDelayMs: 0,
    });

    await expect(failure).rejects.toBeInstanceOf(NetworkError);
    await expect(failure).rejects.toMatchObject({ status: 503 });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("wraps transport failures", async () => {
    const fetchImpl = stubFetch(new TypeError("fetch failed"));

    await expect(
      fetchJsonWithTimeout("https://api.test/x", {}, { fetchImpl: fetchImpl as unknown as FetchFn, retries: 0 }),
    ).rejects.toThrow("Catalog request to https://api.test/x failed: fetch failed");
  });

  it("redacts secrets from logged urls", () => {
    expect(sanitizeUrlForLogs("https://api.test/x?token=abc&q=1")).toBe(
      "https://api.test/x?token=%5Bredacted%5D&q=1",
    );
    expect(sanitizeUrlForLogs("not a url?token=abc")).toBe("not a url?token=[redacted]");
  });
});

describe("short link redirects", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  it("returns the url the redirect chain ends on", async () => {
    const redirected = { redirected: true, url: "https://open.spotify.com/track/t1", status: 200 } as Response;
    const fetchImpl = vi.fn().mockResolvedValue(redirected);

    const url = await resolveRedirect("https://spotify.link/abc", 1_000, fetchImpl as unknown as FetchFn);

    expect(url).toBe("https://open.spotify.com/track/t1");
    expect(fetchImpl).toHaveBeenCalledWith(
      "https://spotify.link/abc",
      expect.objectContaining({ method: "HEAD", redirect: "follow" }),
    );
  });

  it("rejects a link that does not redirect", async () => {
    const direct = { redirected: false, url: "https://spotify.link/abc", status: 200 } as Response;
    const fetchImpl = vi.fn().mockResolvedValue(direct);

    await expect(
      resolveRedirect("https://spotify.link/abc", 1_000, fetchImpl as unknown as FetchFn),
    ).rejects.toMatchObject({ status: 200 });
  });

  it("names the timeout when the shortener hangs", async () => {
    const fetchImpl = vi.fn(
      (_url: string, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(new Error("aborted"));
          });
        }),
    );

    await expect(
      resolveRedirect("https://spotify.link/abc", 10, fetchImpl as unknown as FetchFn),
    ).rejects.toThrow("Could not resolve https://spotify.link/abc: TIMEOUT_10MS");
  });
});
