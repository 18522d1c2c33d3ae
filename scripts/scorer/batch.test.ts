import { beforeEach, describe, expect, it, vi } from "vitest";

import { InvalidAddressError } from "./config";
import { scoreAddresses } from "./batch";

type GraphqlClient = typeof import("@octokit/graphql").graphql;

function emptyRepositoryClient() {
  return vi.fn(async (query: string) => {
    if (query.includes("stargazerCount")) {
      return { repository: { stargazerCount: 7, watchers: { totalCount: 1 }, forkCount: 2 } };
    }
    const connection = { pageInfo: { hasNextPage: false, endCursor: null }, nodes: [] };
    return { repository: { stargazers: connection, watchers: connection, forks: connection } };
  });
}

describe("scoreAddresses", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("scores every address on the pool and counts malformed ones as failures", async () => {
    const graphqlClient = emptyRepositoryClient();
    const reported: string[] = [];

    const summary = await scoreAddresses(
      ["https://github.com/acme/widgets", "https://github.com/justowner", "acme/gadgets"],
      { graphqlClient: graphqlClient as unknown as GraphqlClient },
      { concurrency: 2, onResult: (result) => reported.push(result.repository.name) }
    );

    expect(summary.failures).toBe(1);
    expect(summary.skipped).toBe(0);
    expect(summary.outcomes.map((outcome) => outcome.address)).toEqual([
      "https://github.com/acme/widgets",
      "https://github.com/justowner",
      "acme/gadgets",
    ]);
    const failed = summary.outcomes[1];
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error).toBeInstanceOf(InvalidAddressError);
    }
    expect(reported.sort()).toEqual(["gadgets", "widgets"]);
    expect(graphqlClient).toHaveBeenCalledTimes(8);
  });

  it("skips addresses once the run is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const graphqlClient = emptyRepositoryClient();

    const summary = await scoreAddresses(
      ["acme/widgets", "acme/gadgets"],
      { graphqlClient: graphqlClient as unknown as GraphqlClient, signal: controller.signal },
      { concurrency: 1 }
    );

    expect(summary).toEqual({ outcomes: [], failures: 0, skipped: 2 });
    expect(graphqlClient).not.toHaveBeenCalled();
  });
});
