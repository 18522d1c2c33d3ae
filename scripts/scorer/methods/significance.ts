import { executeQuery } from "../query";
import type { Classification, GraphqlClient, SignificanceRule, UserProfile } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;
export const CONTRIBUTION_WINDOW_DAYS = 365;

export const DEFAULT_SIGNIFICANCE_RULE: SignificanceRule = {
  organization: "microsoft",
  minContributions: 50,
  minRepositories: 5,
};

const EMPTY_PROFILE: UserProfile = {
  contributionsLastYear: 0,
  declaredOrganization: "",
  ownedRepositoryCount: 0,
};

const USER_PROFILE_QUERY = /* GraphQL */ `
  query ($login: String!, $from: DateTime!, $to: DateTime!) {
    user(login: $login) {
      contributionsCollection(from: $from, to: $to) {
        contributionCalendar {
          totalContributions
        }
      }
      company
      repositories {
        totalCount
      }
    }
  }
`;

interface UserProfileQueryResponse {
  user: {
    contributionsCollection: {
      contributionCalendar: { totalContributions: number };
    } | null;
    company: string | null;
    repositories: { totalCount: number } | null;
  } | null;
}

interface UserQueryParams {
  graphqlClient: GraphqlClient;
  login: string;
  now?: Date;
  signal?: AbortSignal;
  debug?: boolean;
}

export function contributionWindow(now: Date): { from: string; to: string } {
  const from = new Date(now.getTime() - CONTRIBUTION_WINDOW_DAYS * DAY_MS);
  return { from: from.toISOString(), to: now.toISOString() };
}

export async function fetchUserProfile({
  graphqlClient,
  login,
  now = new Date(),
  signal,
  debug,
}: UserQueryParams): Promise<UserProfile | null> {
  const { from, to } = contributionWindow(now);
  const result = await executeQuery<UserProfileQueryResponse>(
    graphqlClient,
    USER_PROFILE_QUERY,
    { login, from, to },
    { label: `user:${login}`, signal, debug }
  );

  // an aborted lookup never finished, so it has no profile at all
  if (!result.ok && result.failure.kind === "aborted") {
    return null;
  }

  const user = result.ok ? result.data.user : null;
  if (!user) {
    return { ...EMPTY_PROFILE };
  }

  return {
    contributionsLastYear: user.contributionsCollection?.contributionCalendar.totalContributions ?? 0,
    declaredOrganization: user.company ?? "",
    ownedRepositoryCount: user.repositories?.totalCount ?? 0,
  };
}

export function resolveSignificanceRule(overrides: Partial<SignificanceRule> = {}): SignificanceRule {
  return {
    organization: (overrides.organization ?? DEFAULT_SIGNIFICANCE_RULE.organization).trim().toLowerCase(),
    minContributions: overrides.minContributions ?? DEFAULT_SIGNIFICANCE_RULE.minContributions,
    minRepositories: overrides.minRepositories ?? DEFAULT_SIGNIFICANCE_RULE.minRepositories,
  };
}

/**
 * Organization affiliation is checked first: an affiliated user is never
 * judged on activity.
 */
export function classifyProfile(
  profile: UserProfile,
  rule: SignificanceRule = DEFAULT_SIGNIFICANCE_RULE
): Classification {
  const organization = rule.organization.toLowerCase();
  if (organization.length > 0 && profile.declaredOrganization.toLowerCase().includes(organization)) {
    return "significant-org";
  }
  if (
    profile.contributionsLastYear >= rule.minContributions &&
    profile.ownedRepositoryCount >= rule.minRepositories
  ) {
    return "significant-other";
  }
  return "not-significant";
}

export async function classifyUser(
  params: UserQueryParams & { rule?: SignificanceRule }
): Promise<Classification | undefined> {
  const profile = await fetchUserProfile(params);
  if (!profile) {
    return undefined;
  }
  const classification = classifyProfile(profile, params.rule);
  if (params.debug) {
    console.log(
      `[user:${params.login}] contributions=${profile.contributionsLastYear} repos=${profile.ownedRepositoryCount} org="${profile.declaredOrganization}" → ${classification}`
    );
  }
  return classification;
}
