import { repositorySlug } from "../config";
import { executeQuery } from "../query";
import type { GraphqlClient, RepositoryCounts, RepositoryIdentifier } from "../types";

const COUNTS_QUERY = /* GraphQL */ `
  query ($owner: String!, $repo: String!) {
    repository(owner: $owner, name: $repo) {
      stargazerCount
      watchers { totalCount }
      forkCount
    }
  }
`;

interface CountsQueryResponse {
  repository: {
    stargazerCount: number | null;
    watchers: { totalCount: number | null } | null;
    forkCount: number | null;
  } | null;
}

interface CountRepositoryParams {
  graphqlClient: GraphqlClient;
  repository: RepositoryIdentifier;
  signal?: AbortSignal;
  debug?: boolean;
}

export async function countRepository({
  graphqlClient,
  repository,
  signal,
  debug,
}: CountRepositoryParams): Promise<RepositoryCounts> {
  const slug = repositorySlug(repository);
  const result = await executeQuery<CountsQueryResponse>(
    graphqlClient,
    COUNTS_QUERY,
    { owner: repository.owner, repo: repository.name },
    { label: `${slug}:counts`, signal, debug }
  );

  const node = result.ok ? result.data.repository : null;
  const counts: RepositoryCounts = {
    starCount: node?.stargazerCount ?? 0,
    watcherCount: node?.watchers?.totalCount ?? 0,
    forkCount: node?.forkCount ?? 0,
  };

  if (debug) {
    console.log(
      `[${slug}] [counts] stars=${counts.starCount} watchers=${counts.watcherCount} forks=${counts.forkCount}`
    );
  }

  return counts;
}
