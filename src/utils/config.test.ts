import { describe, expect, it } from "vitest";
import {
  DEFAULT_CHANNEL_ALIAS,
  DEFAULT_CONNECT_TIMEOUT_SECS,
  DEFAULT_READ_TIMEOUT_SECS,
  loadFetchConfig,
} from "./config";

describe("loadFetchConfig", () => {
  it("should return defaults for an empty environment", () => {
    const config = loadFetchConfig({});
    expect(config.sslVerify).toBe(true);
    expect(config.allowNonChannelUrls).toBe(false);
    expect(config.connectTimeoutSecs).toBe(DEFAULT_CONNECT_TIMEOUT_SECS);
    expect(config.readTimeoutSecs).toBe(DEFAULT_READ_TIMEOUT_SECS);
    expect(config.channelAlias).toBe(DEFAULT_CHANNEL_ALIAS);
    expect(config.proxyUrl).toBeUndefined();
  });

  it("should read values from the environment", () => {
    const config = loadFetchConfig({
      REPODATA_SSL_VERIFY: "false",
      REPODATA_ALLOW_NON_CHANNEL_URLS: "1",
      REPODATA_READ_TIMEOUT_SECS: "5",
      REPODATA_CHANNEL_ALIAS: "https://channels.example.com",
      REPODATA_PROXY: "http://proxy.example.com:3128",
    });
    expect(config.sslVerify).toBe(false);
    expect(config.allowNonChannelUrls).toBe(true);
    expect(config.readTimeoutSecs).toBe(5);
    expect(config.channelAlias).toBe("https://channels.example.com");
    expect(config.proxyUrl).toBe("http://proxy.example.com:3128");
  });

  it("should leave the standard proxy variables to the HTTP client", () => {
    const config = loadFetchConfig({
      HTTPS_PROXY: "http://proxy.example.com:3128",
      HTTP_PROXY: "http://proxy.example.com:3128",
      NO_PROXY: "channels.example.com",
    });
    expect(config.proxyUrl).toBeUndefined();
  });

  it("should let --proxy win over REPODATA_PROXY", () => {
    const config = loadFetchConfig(
      { REPODATA_PROXY: "socks5://127.0.0.1:1080" },
      { proxyUrl: "http://proxy.example.com:3128" },
    );
    expect(config.proxyUrl).toBe("http://proxy.example.com:3128");
  });

  it("should let explicit overrides win over the environment", () => {
    const config = loadFetchConfig(
      { REPODATA_SSL_VERIFY: "true" },
      { sslVerify: false, allowNonChannelUrls: undefined },
    );
    expect(config.sslVerify).toBe(false);
    expect(config.allowNonChannelUrls).toBe(false);
  });

  it("should reject invalid values", () => {
    expect(() => loadFetchConfig({ REPODATA_READ_TIMEOUT_SECS: "soon" })).toThrow(
      /REPODATA_READ_TIMEOUT_SECS/,
    );
    expect(() => loadFetchConfig({ REPODATA_SSL_VERIFY: "maybe" })).toThrow(
      /Invalid configuration/,
    );
  });
});
