#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import { createInterface } from "node:readline/promises";

import { scoreAddress, scoreAddresses } from "./batch";
import {
  mergeRepoAddresses,
  parseNonNegativeInteger,
  parsePositiveInteger,
  readRepoAddresses,
} from "./config";
import { DEFAULT_SIGNIFICANCE_RULE } from "./methods/significance";
import { createGraphqlClient } from "./query";
import { renderScoreTable, summaryLine } from "./report";
import type { ScoreOptions, ScoreResult } from "./types";

const PROMPT = "Enter GitHub repo address (e.g., https://github.com/owner/repo): ";

const program = new Command();

program
  .description("Score a GitHub repository by how many of its stargazers, watchers and forkers are significant users")
  .option(
    "-r, --repo <url>",
    "Repository address to score (can be repeated)",
    (value, previous: string[] = []) => {
      previous.push(value);
      return previous;
    }
  )
  .option("-i, --input <path>", "Path to JSON file containing an array of repository addresses")
  .option(
    "--org <substring>",
    "Organization substring that marks a user as affiliated",
    process.env.SCORER_ORG || DEFAULT_SIGNIFICANCE_RULE.organization
  )
  .option(
    "--min-contributions <number>",
    "Contributions over the past 365 days needed to count as significant",
    parseNonNegativeInteger("--min-contributions"),
    DEFAULT_SIGNIFICANCE_RULE.minContributions
  )
  .option(
    "--min-repos <number>",
    "Owned repositories needed to count as significant",
    parseNonNegativeInteger("--min-repos"),
    DEFAULT_SIGNIFICANCE_RULE.minRepositories
  )
  .option(
    "--concurrency <number>",
    "Number of repositories, and of user profiles per repository, to score in parallel",
    parsePositiveInteger("--concurrency"),
    Number.parseInt(process.env.SCORER_CONCURRENCY || "5", 10)
  )
  .option("--json", "Print results as JSON")
  .option("--debug", "Enable verbose per-page and per-user logging")
  .parse(process.argv);

type CliOptions = {
  repo?: string[];
  input?: string;
  org: string;
  minContributions: number;
  minRepos: number;
  concurrency: number;
  json?: boolean;
  debug?: boolean;
};

async function readRepoArguments(inputPath: string | undefined, inlineRepos: string[] | undefined): Promise<string[]> {
  const addresses: string[] = [];
  if (inlineRepos) {
    addresses.push(...inlineRepos);
  }
  if (inputPath) {
    addresses.push(...(await readRepoAddresses(inputPath)));
  }
  return mergeRepoAddresses(addresses);
}

function reportResult(result: ScoreResult, options: CliOptions) {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log(renderScoreTable(result, options.org));
  }
  console.log(summaryLine(result, options.org));
}

async function promptLoop(scoreOptions: ScoreOptions, options: CliOptions, controller: AbortController) {
  const { signal } = controller;
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  // readline swallows Ctrl-C while it owns the terminal
  rl.on("SIGINT", () => controller.abort());
  try {
    while (!signal.aborted) {
      let answer: string;
      try {
        answer = (await rl.question(PROMPT, { signal })).trim();
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        throw error;
      }
      if (answer === "") {
        break;
      }
      await scoreAddress(answer, scoreOptions, (result) => reportResult(result, options));
    }
  } finally {
    rl.close();
  }
}

async function run() {
  const options = program.opts<CliOptions>();

  if (options.debug) {
    console.log("ℹ️  Debug mode enabled");
  }

  const token = process.env.GITHUB_TOKEN;
  if (!token) {
    throw new Error("GITHUB_TOKEN is required. Set it via environment variable or .env file.");
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("\n⚠️  Interrupted, finishing with partial results…");
    controller.abort();
  });

  const scoreOptions: ScoreOptions = {
    graphqlClient: createGraphqlClient(token, process.env.GITHUB_API_URL || undefined),
    rule: {
      organization: options.org,
      minContributions: options.minContributions,
      minRepositories: options.minRepos,
    },
    concurrency: options.concurrency,
    signal: controller.signal,
    debug: Boolean(options.debug),
  };

  const addresses = await readRepoArguments(options.input, options.repo);
  if (addresses.length === 0) {
    await promptLoop(scoreOptions, options, controller);
    return;
  }

  const summary = await scoreAddresses(addresses, scoreOptions, {
    concurrency: options.concurrency,
    onResult: (result) => reportResult(result, options),
  });

  if (summary.skipped > 0) {
    console.log(`⚠️  ${summary.skipped} repository address(es) not scored before cancellation`);
  }
  if (summary.failures > 0) {
    process.exitCode = 1;
  }
}

run().catch((error) => {
  console.error("\n❌ Scorer failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
