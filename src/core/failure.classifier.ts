import { ErrorKind, RawCommandResult, RepositoryAction } from '../types/operation.types';

/**
 * Known failure signature of the tool's output
 */
export interface FailurePattern {
  reason: string;
  pattern: RegExp;
  /** Actions the pattern applies to; omitted means every action */
  actions?: readonly RepositoryAction[];
  message: string;
}

export interface FailureClassification {
  kind: ErrorKind.CLASSIFIED_TOOL_ERROR | ErrorKind.UNCLASSIFIED_TOOL_ERROR;
  reason: string | null;
  message: string;
}

// Order matters: the first matching entry wins.
export const FAILURE_PATTERNS: readonly FailurePattern[] = [
  {
    reason: 'INDEX_LOCKED',
    pattern: /index\.lock'?: file exists|unable to create '.*\.lock'/i,
    message: 'Another git process holds the index lock; wait for it to finish or remove .git/index.lock',
  },
  {
    reason: 'NOT_A_REPOSITORY',
    pattern: /not a git repository/i,
    message: 'Directory is not a git repository',
  },
  {
    reason: 'IDENTITY_UNKNOWN',
    pattern: /please tell me who you are|unable to auto-detect email address/i,
    actions: ['commit', 'merge', 'pull'],
    message: 'Git user identity is not configured; set user.name and user.email',
  },
  {
    reason: 'NOTHING_TO_COMMIT',
    pattern: /nothing to commit|no changes added to commit/i,
    actions: ['commit'],
    message: 'Nothing to commit',
  },
  {
    reason: 'INVALID_BRANCH_NAME',
    pattern: /is not a valid branch name|not a valid ref name/i,
    actions: ['branch-create', 'checkout'],
    message: 'Branch name is not valid',
  },
  {
    reason: 'BRANCH_EXISTS',
    pattern: /already exists/i,
    actions: ['branch-create'],
    message: 'A branch with that name already exists',
  },
  {
    reason: 'UNRELATED_HISTORIES',
    pattern: /refusing to merge unrelated histories/i,
    actions: ['merge', 'pull'],
    message: 'Refusing to merge unrelated histories',
  },
  {
    reason: 'LOCAL_CHANGES_OVERWRITTEN',
    pattern: /would be overwritten by (merge|checkout)|untracked working tree files would be/i,
    actions: ['merge', 'pull', 'checkout'],
    message: 'Local changes would be overwritten; commit or stash them first',
  },
  {
    reason: 'UNMERGED_PATHS',
    pattern: /you have unmerged (paths|files)|resolve your current index first|merging is not possible/i,
    actions: ['commit', 'merge', 'pull', 'checkout'],
    message: 'Repository has unresolved merge conflicts',
  },
  {
    reason: 'MERGE_CONFLICT',
    pattern: /conflict/i,
    actions: ['merge', 'pull'],
    message: 'Merge conflict; resolve the conflicting files and commit the result',
  },
  {
    reason: 'NOT_MERGEABLE',
    pattern: /not something we can merge/i,
    actions: ['merge'],
    message: 'Target is not something git can merge',
  },
  {
    reason: 'REMOTE_REJECTED',
    pattern: /\[(remote )?rejected\]|failed to push some refs|non-fast-forward/i,
    actions: ['push'],
    message: 'Remote rejected the push; pull and integrate remote changes first',
  },
  {
    reason: 'AUTHENTICATION_FAILED',
    pattern: /authentication failed|permission denied|could not read username/i,
    actions: ['push', 'pull'],
    message: 'Authentication with the remote failed',
  },
  {
    reason: 'REMOTE_NOT_FOUND',
    pattern: /does not appear to be a git repository|no such remote|repository '.*' not found/i,
    actions: ['push', 'pull'],
    message: 'Remote repository not found',
  },
  {
    reason: 'REMOTE_UNREACHABLE',
    pattern:
      /could not read from remote repository|could not resolve host|unable to access|connection (refused|timed out)/i,
    actions: ['push', 'pull'],
    message: 'Remote repository is unreachable',
  },
  {
    reason: 'NO_UPSTREAM',
    pattern: /has no upstream branch|no tracking information/i,
    actions: ['push', 'pull'],
    message: 'Current branch has no upstream branch',
  },
  {
    reason: 'REFSPEC_NO_MATCH',
    pattern: /src refspec .* does not match any/i,
    actions: ['push'],
    message: 'Branch to push does not exist locally',
  },
  {
    reason: 'REMOTE_REF_MISSING',
    pattern: /couldn't find remote ref/i,
    actions: ['pull'],
    message: 'Branch does not exist on the remote',
  },
  {
    reason: 'DIVERGENT_BRANCHES',
    pattern: /divergent branches|need to specify how to reconcile/i,
    actions: ['pull'],
    message: 'Local and remote branches have diverged; choose merge or rebase for pull',
  },
  {
    reason: 'PATH_IGNORED',
    pattern: /paths are ignored by one of your \.gitignore files/i,
    actions: ['add'],
    message: 'Path is ignored by .gitignore',
  },
  {
    reason: 'OUTSIDE_REPOSITORY',
    pattern: /is outside repository/i,
    actions: ['add'],
    message: 'Path is outside the repository',
  },
  {
    reason: 'PATHSPEC_NO_MATCH',
    pattern: /pathspec '.*' did not match any/i,
    actions: ['add', 'checkout'],
    message: 'Path or branch did not match anything git knows about',
  },
  {
    reason: 'UNKNOWN_REVISION',
    pattern: /unknown revision|invalid reference|not a valid object name/i,
    actions: ['checkout', 'merge', 'branch-create'],
    message: 'Unknown branch or revision',
  },
  {
    reason: 'NO_COMMITS',
    pattern: /does not have any commits yet|bad default revision 'HEAD'/i,
    message: 'Repository has no commits yet',
  },
];

function firstLine(text: string): string {
  return (
    text
      .split(/\r?\n/)
      .map(line => line.trim())
      .find(line => line.length > 0) ?? ''
  );
}

/**
 * Map a failed invocation to the error taxonomy.
 *
 * stderr is searched first, then stdout (git reports merge conflicts and
 * "nothing to commit" on stdout). Unmatched output falls back to
 * UnclassifiedToolError; this function never throws.
 */
export function classifyFailure(
  action: RepositoryAction,
  result: RawCommandResult,
  patterns: readonly FailurePattern[] = FAILURE_PATTERNS,
): FailureClassification {
  for (const output of [result.stderr, result.stdout]) {
    if (!output) {
      continue;
    }
    const match = patterns.find(
      entry => (!entry.actions || entry.actions.includes(action)) && entry.pattern.test(output),
    );
    if (match) {
      return {
        kind: ErrorKind.CLASSIFIED_TOOL_ERROR,
        reason: match.reason,
        message: match.message,
      };
    }
  }

  const detail = firstLine(result.stderr) || firstLine(result.stdout);
  return {
    kind: ErrorKind.UNCLASSIFIED_TOOL_ERROR,
    reason: null,
    message: detail
      ? `git ${action} failed with exit code ${result.exitCode}: ${detail}`
      : `git ${action} failed with exit code ${result.exitCode}`,
  };
}
