/**
 * Snapshot of a working directory as observed right now.
 * Re-derived before every operation; never kept as a cache.
 */
export interface RepositoryHandle {
  /** Absolute path of the working directory */
  path: string;
  /** Directory exists on disk */
  exists: boolean;
  /** `.git` metadata entry is present */
  isInitialized: boolean;
}

export interface BranchInfo {
  name: string;
  current: boolean;
}

/**
 * Branches ordered with the current branch first
 */
export interface BranchListing {
  current: string | null;
  branches: BranchInfo[];
}

/**
 * Parsed `git status --porcelain` output
 */
export interface RepositoryStatus {
  staged: string[];
  modified: string[];
  untracked: string[];
  conflicted: string[];
  isClean: boolean;
}

export interface PushOptions {
  remote?: string;
  /** Defaults to the current branch */
  branch?: string;
  setUpstream?: boolean;
}

export interface PullOptions {
  remote?: string;
  branch?: string;
}

export interface CreateBranchOptions {
  /** Switch to the new branch after creating it (default: true) */
  checkout?: boolean;
}

/**
 * Parsed from the `[branch hash] subject` line git prints after a commit
 */
export interface CommitSummary {
  branch: string | null;
  hash: string | null;
}
