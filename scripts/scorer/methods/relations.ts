import { repositorySlug } from "../config";
import { executeQuery } from "../query";
import type { GraphqlClient, RelationKind, RepositoryIdentifier } from "../types";

interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
}

interface Connection<TNode> {
  pageInfo: PageInfo;
  nodes: Array<TNode | null> | null;
}

type LoginNode = { login: string };
type ForkNode = { owner: { login: string } | null };

interface RelationQueryResponse {
  repository: {
    stargazers?: Connection<LoginNode>;
    watchers?: Connection<LoginNode>;
    forks?: Connection<ForkNode>;
  } | null;
}

interface RelationQuery {
  query: string;
  extract: (repository: NonNullable<RelationQueryResponse["repository"]>) => {
    pageInfo: PageInfo;
    logins: string[];
  } | null;
}

function loginPage(connection: Connection<LoginNode> | undefined) {
  if (!connection) {
    return null;
  }
  return {
    pageInfo: connection.pageInfo,
    logins: (connection.nodes ?? []).flatMap((node) => (node ? [node.login] : [])),
  };
}

// Forks stand in for the account that created them, so the owner is collected.
function forkOwnerPage(connection: Connection<ForkNode> | undefined) {
  if (!connection) {
    return null;
  }
  return {
    pageInfo: connection.pageInfo,
    logins: (connection.nodes ?? []).flatMap((node) => (node && node.owner ? [node.owner.login] : [])),
  };
}

export const RELATION_QUERIES: Record<RelationKind, RelationQuery> = {
  stargazer: {
    query: /* GraphQL */ `
      query ($owner: String!, $repo: String!, $after: String) {
        repository(owner: $owner, name: $repo) {
          stargazers(first: 100, after: $after) {
            pageInfo { hasNextPage endCursor }
            nodes { login }
          }
        }
      }
    `,
    extract: (repository) => loginPage(repository.stargazers),
  },
  watcher: {
    query: /* GraphQL */ `
      query ($owner: String!, $repo: String!, $after: String) {
        repository(owner: $owner, name: $repo) {
          watchers(first: 100, after: $after) {
            pageInfo { hasNextPage endCursor }
            nodes { login }
          }
        }
      }
    `,
    extract: (repository) => loginPage(repository.watchers),
  },
  forker: {
    query: /* GraphQL */ `
      query ($owner: String!, $repo: String!, $after: String) {
        repository(owner: $owner, name: $repo) {
          forks(first: 100, after: $after) {
            pageInfo { hasNextPage endCursor }
            nodes { owner { login } }
          }
        }
      }
    `,
    extract: (repository) => forkOwnerPage(repository.forks),
  },
};

interface CollectRelationParams {
  graphqlClient: GraphqlClient;
  repository: RepositoryIdentifier;
  kind: RelationKind;
  signal?: AbortSignal;
  debug?: boolean;
}

/**
 * Walks one relation of a repository page by page. Whatever was gathered
 * before a failed request, a missing repository or an abort is returned as is.
 */
export async function collectRelationLogins({
  graphqlClient,
  repository,
  kind,
  signal,
  debug,
}: CollectRelationParams): Promise<Set<string>> {
  const slug = repositorySlug(repository);
  const { query, extract } = RELATION_QUERIES[kind];
  const logins = new Set<string>();
  let cursor: string | null = null;
  let pages = 0;

  while (true) {
    const result = await executeQuery<RelationQueryResponse>(
      graphqlClient,
      query,
      { owner: repository.owner, repo: repository.name, after: cursor },
      { label: `${slug}:${kind}`, signal, debug }
    );

    if (!result.ok) {
      break;
    }

    const repositoryNode = result.data.repository;
    if (!repositoryNode) {
      if (pages === 0) {
        console.error(`⚠️  [${slug}] repository not found or not accessible`);
      }
      break;
    }

    const page = extract(repositoryNode);
    if (!page) {
      break;
    }

    pages += 1;
    for (const login of page.logins) {
      logins.add(login);
    }

    if (debug) {
      console.log(`[${slug}] [${kind}] page ${pages}: +${page.logins.length} (total ${logins.size})`);
    }

    if (!page.pageInfo.hasNextPage || !page.pageInfo.endCursor) {
      break;
    }

    cursor = page.pageInfo.endCursor;
  }

  if (debug) {
    console.log(`[${slug}] [${kind}] collected ${logins.size} unique logins over ${pages} page(s)`);
  }

  return logins;
}
