import { promises as fs } from 'fs';
import path from 'path';
import simpleGit, { SimpleGit, SimpleGitOptions } from 'simple-git';
import { GitError, GitErrorKind, errorMessage } from './errors';
import { createLogger } from './logging';

const logger = createLogger('git');

export interface GitCallOptions {
  signal?: AbortSignal;
}

/**
 * What the deployment core needs from Git. Every method resolves with a full
 * commit hash and fails with a `GitError`.
 */
export interface GitAdapter {
  clone(url: string, branch: string, dest: string, credential: string | null, options?: GitCallOptions): Promise<string>;
  remoteHash(url: string, branch: string, credential: string | null, options?: GitCallOptions): Promise<string>;
  localHash(dest: string): Promise<string>;
  pull(dest: string, branch: string, url: string, credential: string | null, options?: GitCallOptions): Promise<string>;
}

export interface SimpleGitAdapterOptions {
  // How long a remote hash is reused for the same url and branch
  remoteHashTtlMs?: number;
}

/**
 * Injects a token into an http(s) remote: `https://TOKEN@host/owner/repo.git`.
 * Other URL forms (ssh, file paths) are returned unchanged.
 */
export function buildAuthUrl(url: string, credential: string | null): string {
  if (!credential || !/^https?:\/\//.test(url)) {
    return url;
  }
  const parsed = new URL(url);
  parsed.username = credential;
  parsed.password = '';
  return parsed.toString();
}

const AUTH_PATTERNS = [
  'authentication failed',
  'could not read username',
  'could not read password',
  'permission denied',
  'access denied',
  'invalid username or password',
  'returned error: 401',
  'returned error: 403',
  'host key verification failed',
];
const NETWORK_PATTERNS = [
  'could not resolve host',
  'failed to connect',
  'connection refused',
  'connection timed out',
  'operation timed out',
  'unable to access',
  'network is unreachable',
  'the remote end hung up',
  'early eof',
];
const CONFLICT_PATTERNS = [
  'conflict',
  'would be overwritten',
  'not possible to fast-forward',
  'divergent branches',
  'unmerged files',
];
const CORRUPTED_PATTERNS = [
  'not a git repository',
  'corrupt',
  'bad object',
  'loose object',
  'unable to read tree',
  'index.lock',
  'does not appear to be a git repository',
  'unknown revision',
];

export function classifyGitError(error: unknown, fallback: GitErrorKind): GitErrorKind {
  const message = errorMessage(error).toLowerCase();
  if (AUTH_PATTERNS.some((pattern) => message.includes(pattern))) return 'auth';
  if (NETWORK_PATTERNS.some((pattern) => message.includes(pattern))) return 'network';
  if (CONFLICT_PATTERNS.some((pattern) => message.includes(pattern))) return 'conflict';
  if (CORRUPTED_PATTERNS.some((pattern) => message.includes(pattern))) return 'corrupted';
  return fallback;
}

function redact(message: string, credential: string | null): string {
  return credential ? message.split(credential).join('***') : message;
}

/**
 * Git adapter backed by simple-git. Remote hashes come from `git ls-remote`, so
 * checking for new commits never touches a working directory.
 */
export class SimpleGitAdapter implements GitAdapter {
  private remoteHashCache: Map<string, { at: number; hash: string }> = new Map();
  private remoteHashTtlMs: number;

  constructor(options: SimpleGitAdapterOptions = {}) {
    this.remoteHashTtlMs = options.remoteHashTtlMs ?? 5000;
  }

  private git(baseDir: string | undefined, options: GitCallOptions = {}): SimpleGit {
    const config: Partial<SimpleGitOptions> = {
      maxConcurrentProcesses: 1,
      abort: options.signal,
    };
    if (baseDir) config.baseDir = baseDir;
    return simpleGit(config);
  }

  private wrap(error: unknown, fallback: GitErrorKind, credential: string | null, context: string): GitError {
    if (error instanceof GitError) return error;
    const message = redact(errorMessage(error), credential).trim();
    return new GitError(classifyGitError(message, fallback), `${context}: ${message}`);
  }

  async clone(url: string, branch: string, dest: string, credential: string | null, options: GitCallOptions = {}): Promise<string> {
    await fs.mkdir(path.dirname(dest), { recursive: true });
    try {
      logger.info(`Cloning ${url} (${branch}) into ${dest}`);
      await this.git(undefined, options).clone(buildAuthUrl(url, credential), dest, ['--branch', branch, '--single-branch']);
      if (credential) {
        // Keep the token out of .git/config
        await this.git(dest, options).remote(['set-url', 'origin', url]);
      }
    } catch (error) {
      throw this.wrap(error, 'network', credential, 'git clone failed');
    }
    return this.localHash(dest);
  }

  async remoteHash(url: string, branch: string, credential: string | null, options: GitCallOptions = {}): Promise<string> {
    const key = `${url}#${branch}`;
    const cached = this.remoteHashCache.get(key);
    if (cached && Date.now() - cached.at <= this.remoteHashTtlMs) {
      return cached.hash;
    }

    let output: string;
    try {
      output = await this.git(undefined, options).listRemote([buildAuthUrl(url, credential), `refs/heads/${branch}`]);
    } catch (error) {
      throw this.wrap(error, 'network', credential, 'git ls-remote failed');
    }

    const hash = output.trim().split(/\s+/)[0];
    if (!hash) {
      throw new GitError('corrupted', `Branch ${branch} not found on ${url}`);
    }
    this.remoteHashCache.set(key, { at: Date.now(), hash });
    return hash;
  }

  async localHash(dest: string): Promise<string> {
    try {
      const hash = await this.git(dest).revparse(['HEAD']);
      return hash.trim();
    } catch (error) {
      throw this.wrap(error, 'corrupted', null, `Cannot read HEAD of ${dest}`);
    }
  }

  /**
   * Fetches `branch` from `url` and hard-resets the working tree onto it, so
   * local edits never turn into a merge conflict. Untracked files are removed.
   */
  async pull(dest: string, branch: string, url: string, credential: string | null, options: GitCallOptions = {}): Promise<string> {
    const git = this.git(dest, options);
    try {
      await git.raw(['fetch', buildAuthUrl(url, credential), `+refs/heads/${branch}:refs/remotes/origin/${branch}`]);
    } catch (error) {
      throw this.wrap(error, 'network', credential, 'git fetch failed');
    }

    try {
      await git.reset(['--hard', `origin/${branch}`]);
      await git.clean('f', ['-d']);
    } catch (error) {
      throw this.wrap(error, 'conflict', credential, 'git reset failed');
    }
    return this.localHash(dest);
  }
}
