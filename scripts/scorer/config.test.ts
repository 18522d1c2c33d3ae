import fs from "fs-extra";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";

import {
  InvalidAddressError,
  mergeRepoAddresses,
  parsePositiveInteger,
  parseRepositoryAddress,
  readRepoAddresses,
} from "./config";

describe("parseRepositoryAddress", () => {
  it("reads owner and name from the first two path segments", () => {
    expect(parseRepositoryAddress("https://github.com/octocat/Hello-World")).toEqual({
      owner: "octocat",
      name: "Hello-World",
    });
    expect(parseRepositoryAddress("https://github.com/octocat/Hello-World/tree/main/docs")).toEqual({
      owner: "octocat",
      name: "Hello-World",
    });
  });

  it("accepts bare slugs and clone URLs", () => {
    expect(parseRepositoryAddress("octocat/Hello-World")).toEqual({ owner: "octocat", name: "Hello-World" });
    expect(parseRepositoryAddress("https://github.com/octocat/Hello-World.git")).toEqual({
      owner: "octocat",
      name: "Hello-World",
    });
  });

  it("skips a host written without a scheme", () => {
    expect(parseRepositoryAddress("github.com/octocat/Hello-World")).toEqual({
      owner: "octocat",
      name: "Hello-World",
    });
    expect(() => parseRepositoryAddress("github.com/octocat")).toThrow(InvalidAddressError);
  });

  it("rejects addresses without a repository name", () => {
    expect(() => parseRepositoryAddress("https://github.com/justowner")).toThrow(InvalidAddressError);
    expect(() => parseRepositoryAddress("https://github.com/")).toThrow(
      "Invalid repository address 'https://github.com/'. Expected https://github.com/<owner>/<name>."
    );
  });
});

describe("repository address lists", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "scorer-config-"));
  });

  it("reads a JSON array of addresses", async () => {
    const listPath = path.join(tmpDir, "repos.json");
    await fs.writeJson(listPath, [" https://github.com/acme/widgets ", "acme/gadgets"]);

    await expect(readRepoAddresses(listPath)).resolves.toEqual([
      "https://github.com/acme/widgets",
      "acme/gadgets",
    ]);
  });

  it("rejects files that are not arrays of strings", async () => {
    const objectPath = path.join(tmpDir, "object.json");
    const mixedPath = path.join(tmpDir, "mixed.json");
    await fs.writeJson(objectPath, { repos: [] });
    await fs.writeJson(mixedPath, ["acme/widgets", 42]);

    await expect(readRepoAddresses(objectPath)).rejects.toThrow("Repo list file must contain a JSON array");
    await expect(readRepoAddresses(mixedPath)).rejects.toThrow(
      "Repo list entry #2 must be a non-empty address string"
    );
    await expect(readRepoAddresses(path.join(tmpDir, "missing.json"))).rejects.toThrow("Repo list file not found");
  });

  it("drops duplicate addresses ignoring case and trailing slashes", () => {
    expect(
      mergeRepoAddresses(["https://github.com/Acme/Widgets", "https://github.com/acme/widgets/", "acme/gadgets"])
    ).toEqual(["https://github.com/Acme/Widgets", "acme/gadgets"]);
  });
});

describe("parsePositiveInteger", () => {
  it("parses positive values and rejects the rest", () => {
    const parse = parsePositiveInteger("--concurrency");
    expect(parse("8")).toBe(8);
    expect(() => parse("0")).toThrow("--concurrency must be a positive integer");
    expect(() => parse("many")).toThrow("--concurrency must be a positive integer");
  });
});
