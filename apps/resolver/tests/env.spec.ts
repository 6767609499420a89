import { afterEach, describe, expect, it } from "vitest";
import { parseEnvLine, readEnvVar, readIntEnvVar } from "../src/lib/env";

describe("env file lines", () => {
  it("reads key and value pairs", () => {
    expect(parseEnvLine("SPOTIFY_MARKET=FR")).toEqual({ key: "SPOTIFY_MARKET", value: "FR" });
    expect(parseEnvLine("  RESOLVER_THREADS = 4  ")).toEqual({ key: "RESOLVER_THREADS", value: "4" });
  });

  it("strips matching quotes only", () => {
    expect(parseEnvLine('SPOTIFY_CLIENT_SECRET="test-secret"')).toEqual({
      key: "SPOTIFY_CLIENT_SECRET",
      value: "test-secret",
    });
    expect(parseEnvLine("NAME='a=b'")).toEqual({ key: "NAME", value: "a=b" });
    expect(parseEnvLine("NAME=\"open")).toEqual({ key: "NAME", value: '"open' });
  });

  it("skips comments, blanks and lines without a key", () => {
    expect(parseEnvLine("# SPOTIFY_CLIENT_ID=x")).toBeNull();
    expect(parseEnvLine("   ")).toBeNull();
    expect(parseEnvLine("=value")).toBeNull();
    expect(parseEnvLine("NO_VALUE_MARKER")).toBeNull();
  });
});

describe("env vars", () => {
  const key = "SONGBRIDGE_TEST_THREADS";

  afterEach(() => {
    delete process.env[key];
  });

  it("prefers the trimmed process value", () => {
    process.env[key] = "  6 ";
    expect(readEnvVar(key)).toBe("6");
    expect(readIntEnvVar(key, 1)).toBe(6);
  });

  it("falls back on blank, invalid or too small values", () => {
    expect(readIntEnvVar(key, 3)).toBe(3);
    process.env[key] = "many";
    expect(readIntEnvVar(key, 3)).toBe(3);
    process.env[key] = "0";
    expect(readIntEnvVar(key, 3)).toBe(3);
    expect(readIntEnvVar(key, 3, 0)).toBe(0);
  });
});
