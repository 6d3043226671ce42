import { describe, expect, it, vi } from "vitest";
import { ChannelRepo } from "./ChannelRepo";
import { RepodataFetcher } from "./RepodataFetcher";
import { createEmptyRecord } from "./RepodataState";
import { RepodataFetchStatus } from "./types";

vi.mock("./RepodataFetcher");

describe("ChannelRepo", () => {
  it("should fetch the default document through its fetcher", async () => {
    const fetcher = new RepodataFetcher();
    const result = { status: RepodataFetchStatus.NOT_MODIFIED, url: "https://x.example/c/noarch/repodata.json" } as const;
    vi.mocked(fetcher.fetch).mockResolvedValue(result);
    const record = createEmptyRecord();

    const repo = new ChannelRepo("https://x.example/c/noarch", undefined, fetcher);

    await expect(repo.repodata(record)).resolves.toBe(result);
    expect(fetcher.fetch).toHaveBeenCalledWith("https://x.example/c/noarch", "repodata.json", record);
  });

  it("should use a custom document filename", async () => {
    const fetcher = new RepodataFetcher();
    vi.mocked(fetcher.fetch).mockResolvedValue({
      status: RepodataFetchStatus.NOT_MODIFIED,
      url: "https://x.example/c/noarch/current_repodata.json",
    });

    const repo = new ChannelRepo("https://x.example/c/noarch", "current_repodata.json", fetcher);
    await repo.repodata(createEmptyRecord());

    expect(repo.repodataFn).toBe("current_repodata.json");
    expect(fetcher.fetch).toHaveBeenCalledWith(
      "https://x.example/c/noarch",
      "current_repodata.json",
      expect.any(Object),
    );
  });
});
