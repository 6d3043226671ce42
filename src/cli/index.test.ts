/**
 * CLI argument tests.
 * Tests that commands expose the expected options and pass parsed flags on.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

const refreshFn = vi.fn();
vi.mock("../repodata/RepodataCache", () => ({
  RepodataCache: vi.fn().mockImplementation(function () {
    return { refresh: refreshFn };
  }),
}));
vi.mock("../repodata/RepodataFetcher", () => ({
  RepodataFetcher: vi.fn(),
}));

import { RepodataCache } from "../repodata/RepodataCache";
import { RepodataFetcher } from "../repodata/RepodataFetcher";
import { RepodataFetchStatus } from "../repodata/types";
import { LogLevel, setLogLevel } from "../utils/logger";
import { createCliProgram } from "./index";

describe("CLI command options", () => {
  const program = createCliProgram();

  const getCommandOptions = (commandName?: string) => {
    if (!commandName) {
      return program.options.map((opt) => opt.long);
    }
    const command = program.commands.find((cmd) => cmd.name() === commandName);
    return command?.options.map((opt) => opt.long) || [];
  };

  it("should register the fetch and state commands", () => {
    expect(program.commands.map((cmd) => cmd.name())).toEqual(["fetch", "state"]);
  });

  it("should expose global options", () => {
    expect(getCommandOptions()).toEqual(
      expect.arrayContaining(["--verbose", "--silent", "--cache-dir"]),
    );
  });

  it("should expose fetch options", () => {
    expect(getCommandOptions("fetch")).toEqual([
      "--repodata-fn",
      "--no-ssl-verify",
      "--allow-non-channel-urls",
      "--proxy",
      "--print",
    ]);
  });

  it("should expose state options", () => {
    expect(getCommandOptions("state")).toEqual(["--repodata-fn"]);
  });
});

describe("CLI argument parsing", () => {
  const CHANNEL_SUBDIR = "https://channels.example.com/demo/noarch";

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    refreshFn.mockResolvedValue({
      status: RepodataFetchStatus.NOT_MODIFIED,
      url: `${CHANNEL_SUBDIR}/repodata.json`,
      content: "{}",
      cachePath: "/cache/abcd1234.json",
      statePath: "/cache/abcd1234.state.json",
      record: {
        etag: "",
        lastModified: "",
        cacheControl: "",
        size: 2,
        mtimeNs: 1n,
        sourceUrl: CHANNEL_SUBDIR,
        extra: {},
      },
    });
  });

  it("should refresh the default document", async () => {
    await createCliProgram().parseAsync(["fetch", CHANNEL_SUBDIR], { from: "user" });

    expect(refreshFn).toHaveBeenCalledWith(CHANNEL_SUBDIR, "repodata.json");
  });

  it("should pass fetch flags on", async () => {
    await createCliProgram().parseAsync(
      [
        "--cache-dir",
        "/cache",
        "fetch",
        CHANNEL_SUBDIR,
        "--repodata-fn",
        "current_repodata.json",
        "--no-ssl-verify",
        "--allow-non-channel-urls",
        "--proxy",
        "socks5://127.0.0.1:1080",
      ],
      { from: "user" },
    );

    expect(RepodataCache).toHaveBeenCalledWith("/cache", expect.anything());
    expect(RepodataFetcher).toHaveBeenCalledWith({
      config: expect.objectContaining({
        sslVerify: false,
        allowNonChannelUrls: true,
        proxyUrl: "socks5://127.0.0.1:1080",
      }),
    });
    expect(refreshFn).toHaveBeenCalledWith(CHANNEL_SUBDIR, "current_repodata.json");
  });

  it("should print the document with --print", async () => {
    await createCliProgram().parseAsync(["fetch", CHANNEL_SUBDIR, "--print"], { from: "user" });

    expect(console.log).toHaveBeenCalledWith("{}");
  });

  it("should raise the log level with --verbose", async () => {
    await createCliProgram().parseAsync(["--verbose", "fetch", CHANNEL_SUBDIR], {
      from: "user",
    });

    expect(setLogLevel).toHaveBeenCalledWith(LogLevel.DEBUG);
  });

  it("should lower the log level with --silent", async () => {
    await createCliProgram().parseAsync(["--silent", "fetch", CHANNEL_SUBDIR], {
      from: "user",
    });

    expect(setLogLevel).toHaveBeenCalledWith(LogLevel.ERROR);
  });
});
