import { parseRepositoryAddress, repositorySlug } from "./config";
import { countRepository } from "./methods/counts";
import { collectRelationLogins } from "./methods/relations";
import { classifyUser, resolveSignificanceRule } from "./methods/significance";
import { mapWithConcurrency } from "./pool";
import type { Classification, RelationKind, ScoreOptions, ScoreResult } from "./types";

const DEFAULT_CONCURRENCY = 5;

export function unionLogins(sets: Iterable<ReadonlySet<string>>): Set<string> {
  const union = new Set<string>();
  for (const set of sets) {
    for (const login of set) {
      union.add(login);
    }
  }
  return union;
}

export function engagementRate(count: number, total: number): number {
  return total === 0 ? 0 : count / total;
}

export interface ClassificationTally {
  significantLogins: string[];
  orgLogins: string[];
}

export function tallyClassifications(
  logins: readonly string[],
  classifications: ReadonlyArray<Classification | undefined>
): ClassificationTally {
  const significantLogins: string[] = [];
  const orgLogins: string[] = [];
  logins.forEach((login, index) => {
    const classification = classifications[index];
    if (classification === "significant-org") {
      significantLogins.push(login);
      orgLogins.push(login);
    } else if (classification === "significant-other") {
      significantLogins.push(login);
    }
  });
  return { significantLogins: significantLogins.sort(), orgLogins: orgLogins.sort() };
}

/**
 * Scores one repository address. Only a malformed address throws; every
 * network problem degrades to fewer users or zero counts.
 */
export async function scoreRepository(address: string, options: ScoreOptions): Promise<ScoreResult> {
  const repository = parseRepositoryAddress(address);
  const slug = repositorySlug(repository);
  const { graphqlClient, signal, debug } = options;
  const rule = resolveSignificanceRule(options.rule);
  const now = options.now ?? (() => new Date());

  const collect = (kind: RelationKind) =>
    collectRelationLogins({ graphqlClient, repository, kind, signal, debug });

  const [counts, stargazers, watchers, forkers] = await Promise.all([
    countRepository({ graphqlClient, repository, signal, debug }),
    collect("stargazer"),
    collect("watcher"),
    collect("forker"),
  ]);

  const relationCounts: Record<RelationKind, number> = {
    stargazer: stargazers.size,
    watcher: watchers.size,
    forker: forkers.size,
  };

  const engaged = unionLogins([stargazers, watchers, forkers]);

  const logins = Array.from(engaged);
  const progressStep = Math.max(1, Math.ceil(logins.length / 10));
  const { results } = await mapWithConcurrency(
    logins,
    (login) => classifyUser({ graphqlClient, login, rule, now: now(), signal, debug }),
    {
      concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
      signal,
      onProgress: debug
        ? (done, total) => {
            if (done % progressStep === 0 || done === total) {
              console.log(`[${slug}] classified ${done}/${total} users`);
            }
          }
        : undefined,
    }
  );

  const tally = tallyClassifications(logins, results);
  const totalEngaged = logins.length;
  const classifiedCount = results.filter((classification) => classification !== undefined).length;

  return {
    repository,
    ...counts,
    relationCounts,
    totalEngaged,
    significantCount: tally.significantLogins.length,
    orgCount: tally.orgLogins.length,
    powerUserRate: engagementRate(tally.significantLogins.length, totalEngaged),
    orgUserRate: engagementRate(tally.orgLogins.length, totalEngaged),
    significantLogins: tally.significantLogins,
    orgLogins: tally.orgLogins,
    classifiedCount,
    cancelled: Boolean(signal?.aborted),
  };
}
