import Table from "cli-table3";
import { repositorySlug } from "./config";
import { RELATION_KINDS, type ScoreResult } from "./types";

const RELATION_LABELS = {
  stargazer: "Unique stargazers",
  watcher: "Unique watchers",
  forker: "Unique forkers",
} as const;

export function formatRate(rate: number): string {
  return rate.toFixed(2);
}

export function scoreRows(result: ScoreResult, organization: string): Array<[string, string]> {
  const rows: Array<[string, string]> = [
    ["Stars", String(result.starCount)],
    ["Watches", String(result.watcherCount)],
    ["Forks", String(result.forkCount)],
    ...RELATION_KINDS.map((kind): [string, string] => [RELATION_LABELS[kind], String(result.relationCounts[kind])]),
    ["Total unique users", String(result.totalEngaged)],
    ["Significant users", String(result.significantCount)],
    [`${organization} users`, String(result.orgCount)],
    ["Power users rate", formatRate(result.powerUserRate)],
    [`${organization} users rate`, formatRate(result.orgUserRate)],
  ];

  if (result.cancelled) {
    rows.push(["Classified (cancelled run)", `${result.classifiedCount}/${result.totalEngaged}`]);
  }

  return rows;
}

export function summaryLine(result: ScoreResult, organization: string): string {
  if (result.cancelled) {
    return `⚠️  Run cancelled: ${result.classifiedCount}/${result.totalEngaged} users classified`;
  }
  return `✅ ${repositorySlug(result.repository)}: power users rate ${formatRate(result.powerUserRate)}, ${organization} users rate ${formatRate(result.orgUserRate)}`;
}

export function renderScoreTable(result: ScoreResult, organization: string): string {
  const table = new Table({
    head: [repositorySlug(result.repository), "Value"],
  });
  for (const row of scoreRows(result, organization)) {
    table.push(row);
  }
  return table.toString();
}
