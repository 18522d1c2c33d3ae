import type { graphql } from "@octokit/graphql";

export type GraphqlClient = typeof graphql;

export type RelationKind = "stargazer" | "watcher" | "forker";

export const RELATION_KINDS: readonly RelationKind[] = ["stargazer", "watcher", "forker"];

export type Classification = "not-significant" | "significant-other" | "significant-org";

export interface RepositoryIdentifier {
  owner: string;
  name: string;
}

export interface RepositoryCounts {
  starCount: number;
  watcherCount: number;
  forkCount: number;
}

export interface UserProfile {
  contributionsLastYear: number;
  declaredOrganization: string;
  ownedRepositoryCount: number;
}

export interface SignificanceRule {
  organization: string;
  minContributions: number;
  minRepositories: number;
}

export interface ScoreOptions {
  graphqlClient: GraphqlClient;
  rule?: Partial<SignificanceRule>;
  concurrency?: number;
  now?: () => Date;
  signal?: AbortSignal;
  debug?: boolean;
}

export interface ScoreResult extends RepositoryCounts {
  repository: RepositoryIdentifier;
  relationCounts: Record<RelationKind, number>;
  totalEngaged: number;
  significantCount: number;
  orgCount: number;
  powerUserRate: number;
  orgUserRate: number;
  significantLogins: string[];
  orgLogins: string[];
  classifiedCount: number;
  cancelled: boolean;
}
