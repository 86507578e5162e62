import { Octokit, type RestEndpointMethodTypes } from "@octokit/rest";
import { RequestError } from "@octokit/request-error";

import { AuthError, ConfigError, NetworkError, errorMessage } from "../errors.js";
import type {
  CommitRecord,
  FetchFn,
  FileChange,
  Logger,
  RepositoryRef,
} from "../types/index.js";

export type CommitStub = RestEndpointMethodTypes["repos"]["listCommits"]["response"]["data"][number];
export type CommitDetail = RestEndpointMethodTypes["repos"]["getCommit"]["response"]["data"];
type DetailFile = NonNullable<CommitDetail["files"]>[number];

export const PAGE_SIZE = 100;
/** Raw patches above this size are cut when the record is built */
export const MAX_STORED_PATCH_CHARS = 20_000;

export interface GitHubClientOptions {
  token: string;
  logger: Logger;
  /** Replaces the HTTP transport, used by tests */
  fetch?: FetchFn;
}

export function createGitHubClient({ token, logger, fetch }: GitHubClientOptions): Octokit {
  return new Octokit({
    auth: token,
    userAgent: "commit-digest",
    log: logger,
    request: fetch ? { fetch } : undefined,
  });
}

/**
 * Converts an Octokit failure into AuthError or NetworkError
 */
function toGitHubError(error: unknown, what: string): AuthError | NetworkError {
  if (error instanceof RequestError) {
    if (error.status === 401 || error.status === 403) {
      return new AuthError(`GitHub rejected the token while ${what} (${error.status})`, {
        status: error.status,
        cause: error,
      });
    }
    return new NetworkError(`GitHub request failed while ${what} (${error.status}): ${error.message}`, {
      status: error.status,
      cause: error,
    });
  }
  return new NetworkError(`GitHub request failed while ${what}: ${errorMessage(error)}`, { cause: error });
}

/**
 * Lists the user's repositories, most recently updated first
 */
export async function listRepositories(
  octokit: Octokit,
  username: string,
  logger: Logger
): Promise<RepositoryRef[]> {
  const repositories: RepositoryRef[] = [];

  for (let page = 1; ; page++) {
    let data: RestEndpointMethodTypes["repos"]["listForUser"]["response"]["data"];
    try {
      ({ data } = await octokit.rest.repos.listForUser({
        username,
        sort: "updated",
        per_page: PAGE_SIZE,
        page,
      }));
    } catch (error) {
      throw toGitHubError(error, `listing repositories for ${username}`);
    }

    logger.debug(`Repositories page ${page}: ${data.length} entries`);
    for (const repo of data) {
      repositories.push({ owner: repo.owner.login, name: repo.name, fullName: repo.full_name });
    }

    if (data.length < PAGE_SIZE) {
      break;
    }
  }

  return repositories;
}

/**
 * Lists commits made after `since`. An empty repository yields no commits.
 */
export async function listCommitsSince(
  octokit: Octokit,
  owner: string,
  repo: string,
  since: Date,
  logger: Logger
): Promise<CommitStub[]> {
  const commits: CommitStub[] = [];

  for (let page = 1; ; page++) {
    let data: CommitStub[];
    try {
      ({ data } = await octokit.rest.repos.listCommits({
        owner,
        repo,
        since: since.toISOString(),
        per_page: PAGE_SIZE,
        page,
      }));
    } catch (error) {
      // 409 Conflict: "Git Repository is empty."
      if (error instanceof RequestError && error.status === 409) {
        logger.debug(`${owner}/${repo} is empty`);
        return commits;
      }
      throw toGitHubError(error, `listing commits for ${owner}/${repo}`);
    }

    commits.push(...data);

    if (data.length < PAGE_SIZE) {
      break;
    }
  }

  return commits;
}

/**
 * Fetches detailed information about a specific commit
 */
export async function getCommitDetails(
  octokit: Octokit,
  owner: string,
  repo: string,
  commitSha: string
): Promise<CommitDetail> {
  try {
    const { data } = await octokit.rest.repos.getCommit({ owner, repo, ref: commitSha });
    return data;
  } catch (error) {
    throw toGitHubError(error, `fetching commit ${owner}/${repo}@${commitSha.slice(0, 7)}`);
  }
}

function toFileChange(file: DetailFile): FileChange {
  const patch = file.patch === undefined ? undefined : file.patch.slice(0, MAX_STORED_PATCH_CHARS);
  return {
    filename: file.filename,
    status: file.status,
    additions: file.additions,
    deletions: file.deletions,
    changes: file.changes,
    ...(patch === undefined ? {} : { patch }),
  };
}

export function toCommitRecord(repository: string, stub: CommitStub, detail: CommitDetail): CommitRecord {
  return {
    repository,
    sha: stub.sha.slice(0, 7),
    message: stub.commit.message,
    author: stub.commit.author?.name ?? "Unknown",
    date: stub.commit.author?.date ?? "",
    url: stub.html_url,
    files: (detail.files ?? []).map(toFileChange),
    stats: {
      additions: detail.stats?.additions ?? 0,
      deletions: detail.stats?.deletions ?? 0,
      total: detail.stats?.total ?? 0,
    },
  };
}

export interface FetchRecentCommitsOptions {
  octokit: Octokit;
  username: string;
  token: string;
  logger: Logger;
  lookbackHours?: number;
  now?: Date;
}

/**
 * Collects every commit of the user's repositories inside the lookback window.
 * Only a failed repository listing aborts; single repositories and commits
 * that fail are logged and skipped.
 */
export async function fetchRecentCommits({
  octokit,
  username,
  token,
  logger,
  lookbackHours = 24,
  now = new Date(),
}: FetchRecentCommitsOptions): Promise<CommitRecord[]> {
  if (!username) {
    throw new ConfigError("GitHub username required. Set GITHUB_USERNAME.");
  }
  if (!token) {
    throw new ConfigError("GitHub token required. Set GITHUB_TOKEN.");
  }

  const since = new Date(now.getTime() - lookbackHours * 60 * 60 * 1000);
  logger.info(`Fetching commits from ${username}'s repositories since ${since.toISOString()}`);

  const repositories = await listRepositories(octokit, username, logger);
  logger.info(`Found ${repositories.length} repositories`);

  const pending: Array<{ repository: RepositoryRef; stub: CommitStub }> = [];
  for (const repository of repositories) {
    try {
      const stubs = await listCommitsSince(octokit, repository.owner, repository.name, since, logger);
      if (stubs.length > 0) {
        logger.info(`Found ${stubs.length} commit(s) in ${repository.fullName}`);
      }
      for (const stub of stubs) {
        pending.push({ repository, stub });
      }
    } catch (error) {
      logger.warn(`Skipping ${repository.fullName}: ${errorMessage(error)}`);
    }
  }

  logger.info(`Total commits found: ${pending.length}`);

  const records: CommitRecord[] = [];
  for (const { repository, stub } of pending) {
    try {
      const detail = await getCommitDetails(octokit, repository.owner, repository.name, stub.sha);
      records.push(toCommitRecord(repository.fullName, stub, detail));
    } catch (error) {
      logger.warn(`Skipping commit ${repository.fullName}@${stub.sha.slice(0, 7)}: ${errorMessage(error)}`);
    }
  }

  return records;
}
