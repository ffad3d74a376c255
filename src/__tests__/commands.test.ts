import { afterEach, describe, expect, it, vi } from "vitest";
import { createCommandContext, runListCommand } from "../core/commands";
import { ConfigError } from "../core/errors";
import { feedResponse, paper, stubHttp, testConfig } from "./fixtures";

describe("runListCommand", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists entries with their keys without building a store", async () => {
    const lines: string[] = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      lines.push(line);
    });
    const config = testConfig({ logLevel: "info", store: { container: "", prefix: "ml/" } });
    const http = stubHttp(() => feedResponse([paper("2505.00001v1"), { id: "http://arxiv.org/abs/2505.00002v1" }]));
    const ctx = createCommandContext(config, "run_test", { http });

    await expect(runListCommand(ctx)).resolves.toBe(1);

    expect(http).toHaveBeenCalledTimes(1);
    const entries = lines.map((line) => JSON.parse(line)).filter((line) => line.msg === "list_entry");
    expect(entries).toMatchObject([{ paperId: "2505.00001v1", key: "ml/2505.00001v1.pdf" }]);
    expect(() => ctx.getStore()).toThrow(ConfigError);
  });
});
