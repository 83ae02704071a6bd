import { describe, expect, it } from "vitest";
import { loadPipelineConfig, parseEnv, redactConnectionUrl, rssFeedUrls } from "./env";

describe("parseEnv", () => {
  it("applies defaults", () => {
    const parsed = parseEnv({});

    expect(parsed.NODE_ENV).toBe("development");
    expect(parsed.PIPELINE_SOURCES).toBe("news,profile");
    expect(parsed.SIMILARITY_THRESHOLD).toBe(0.35);
    expect(parsed.EMBEDDING_PROVIDER).toBe("hashing");
    expect(parsed.EMBEDDING_DIMENSION).toBe(768);
    expect(parsed.FETCH_TIMEOUT_MS).toBe(600_000);
  });

  it("rejects a threshold outside [0, 1] and an unknown embedding provider", () => {
    expect(() => parseEnv({ SIMILARITY_THRESHOLD: "1.5" })).toThrow();
    expect(() => parseEnv({ EMBEDDING_PROVIDER: "openai" })).toThrow();
  });
});

describe("loadPipelineConfig", () => {
  it("normalizes and dedupes the source list and client keywords", () => {
    const config = loadPipelineConfig(
      parseEnv({
        PIPELINE_SOURCES: " News, profile ,news,,mock",
        CLIENT_PROFILE_KEYWORDS: "robotics, ,welding",
        CLIENT_PROFILE_DESCRIPTION: "  Mid-size manufacturers ",
      }),
    );

    expect(config.sources).toEqual(["news", "profile", "mock"]);
    expect(config.clientProfile).toEqual({
      keywords: ["robotics", "welding"],
      description: "Mid-size manufacturers",
    });
  });

  it("parses per-source throttle overrides", () => {
    const config = loadPipelineConfig(
      parseEnv({ SOURCE_THROTTLES: '{"profile":{"capacity":1,"refillPerSecond":0.5}}' }),
    );

    expect(config.throttle).toEqual({
      defaults: { capacity: 5, refillPerSecond: 1 },
      overrides: { profile: { capacity: 1, refillPerSecond: 0.5 } },
      acquireTimeoutMs: 30_000,
    });
  });

  it("fails fast on malformed throttle overrides", () => {
    expect(() => loadPipelineConfig(parseEnv({ SOURCE_THROTTLES: "{profile" }))).toThrow(
      /^SOURCE_THROTTLES is not valid JSON: /,
    );
    expect(() =>
      loadPipelineConfig(parseEnv({ SOURCE_THROTTLES: '{"profile":{"capacity":0,"refillPerSecond":1}}' })),
    ).toThrow();
  });
});

describe("rssFeedUrls", () => {
  it("splits the comma-separated feed list", () => {
    expect(
      rssFeedUrls(parseEnv({ RSS_FEED_URLS: "https://a.example/feed, https://b.example/rss.xml," })),
    ).toEqual(["https://a.example/feed", "https://b.example/rss.xml"]);
  });
});

describe("redactConnectionUrl", () => {
  it("drops the user and password but keeps host, port and path", () => {
    expect(redactConnectionUrl("postgres://app:test-secret@db:5432/signals")).toBe(
      "postgres://db:5432/signals",
    );
    expect(redactConnectionUrl("redis://:test-secret@cache:6379/0")).toBe("redis://cache:6379/0");
  });

  it("reports an unparseable value without echoing it", () => {
    expect(redactConnectionUrl("test-secret")).toBe("invalid URL");
  });
});
