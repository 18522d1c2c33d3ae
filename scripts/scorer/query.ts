import { graphql, GraphqlResponseError } from "@octokit/graphql";
import type { GraphqlClient } from "./types";

const DEFAULT_BASE_URL = "https://api.github.com";

export type QueryVariables = Record<string, string | null>;

export interface QueryFailure {
  kind: "transport" | "graphql" | "aborted";
  status?: number;
  message: string;
}

export type QueryResult<T> = { ok: true; data: T } | { ok: false; failure: QueryFailure };

export interface ExecuteQueryOptions {
  label: string;
  signal?: AbortSignal;
  debug?: boolean;
}

export function createGraphqlClient(token: string, baseUrl: string = DEFAULT_BASE_URL): GraphqlClient {
  return graphql.defaults({
    baseUrl,
    headers: {
      authorization: `bearer ${token}`,
    },
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Runs one GraphQL document. Transport-class problems come back as a
 * `QueryFailure` so callers can keep whatever they already collected.
 *
 * A 200 response that carries an `errors` array still counts as data when
 * the partial tree is present: GitHub reports a missing repository or user
 * that way, with the node itself set to null.
 */
export async function executeQuery<T>(
  client: GraphqlClient,
  query: string,
  variables: QueryVariables,
  { label, signal, debug }: ExecuteQueryOptions
): Promise<QueryResult<T>> {
  if (signal?.aborted) {
    return { ok: false, failure: { kind: "aborted", message: "Aborted before request" } };
  }

  try {
    const data = await client<T>(query, { ...variables, request: { signal } });
    return { ok: true, data };
  } catch (error) {
    if (signal?.aborted) {
      if (debug) {
        console.log(`[${label}] request aborted`);
      }
      return { ok: false, failure: { kind: "aborted", message: describeError(error) } };
    }

    if (error instanceof GraphqlResponseError) {
      const messages = error.errors?.map((entry) => entry.message).join("; ") ?? error.message;
      if (error.data !== undefined && error.data !== null) {
        if (debug) {
          console.log(`[${label}] ⚠️  GraphQL errors with partial data: ${messages}`);
        }
        const partial: T = error.data;
        return { ok: true, data: partial };
      }
      console.error(`⚠️  [${label}] GraphQL query failed: ${messages}`);
      return { ok: false, failure: { kind: "graphql", message: messages } };
    }

    const status = statusOf(error);
    const message = describeError(error);
    console.error(`⚠️  [${label}] GraphQL request failed${status ? ` (HTTP ${status})` : ""}: ${message}`);
    return { ok: false, failure: { kind: "transport", status, message } };
  }
}
