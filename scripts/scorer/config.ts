import fs from "fs-extra";
import path from "node:path";
import type { RepositoryIdentifier } from "./types";

export class InvalidAddressError extends Error {
  readonly address: string;

  constructor(address: string) {
    super(`Invalid repository address '${address}'. Expected https://github.com/<owner>/<name>.`);
    this.name = "InvalidAddressError";
    this.address = address;
  }
}

function addressSegments(address: string): string[] {
  let pathname: string;
  let hasHost = false;
  try {
    pathname = new URL(address).pathname;
    hasHost = true;
  } catch {
    // bare owner/name, or host/owner/name without a scheme
    pathname = address;
  }
  const segments = pathname.split("/").filter((segment) => segment.length > 0);
  // logins never contain a dot, so a dotted first segment is a host
  if (!hasHost && segments[0]?.includes(".")) {
    return segments.slice(1);
  }
  return segments;
}

export function parseRepositoryAddress(address: string): RepositoryIdentifier {
  const [owner, rawName] = addressSegments(address.trim());
  if (!owner || !rawName) {
    throw new InvalidAddressError(address);
  }
  const name = rawName.endsWith(".git") ? rawName.slice(0, -".git".length) : rawName;
  if (!name) {
    throw new InvalidAddressError(address);
  }
  return { owner, name };
}

export function repositorySlug(repository: RepositoryIdentifier): string {
  return `${repository.owner}/${repository.name}`;
}

export async function readRepoAddresses(filePath: string): Promise<string[]> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`Repo list file not found: ${resolved}`);
  }
  const raw = await fs.readFile(resolved, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error("Repo list file must contain a JSON array");
  }
  return parsed.map((entry, index) => {
    if (typeof entry !== "string" || entry.trim().length === 0) {
      throw new Error(`Repo list entry #${index + 1} must be a non-empty address string`);
    }
    return entry.trim();
  });
}

export function mergeRepoAddresses(addresses: string[]): string[] {
  const seen = new Map<string, string>();
  for (const address of addresses) {
    const key = address.trim().replace(/\/+$/, "").toLowerCase();
    if (!seen.has(key)) {
      seen.set(key, address.trim());
    }
  }
  return Array.from(seen.values());
}

export function parsePositiveInteger(flag: string) {
  return (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new Error(`${flag} must be a positive integer`);
    }
    return parsed;
  };
}

export function parseNonNegativeInteger(flag: string) {
  return (value: string): number => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw new Error(`${flag} must be a non-negative integer`);
    }
    return parsed;
  };
}
