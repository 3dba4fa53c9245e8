/**
 * Path Sandbox
 *
 * Decides whether a client-supplied path may be touched and, if so, which
 * canonical path to operate on. Every tool routes its paths through
 * `PathSandbox.resolve()` before any I/O.
 *
 * Resolution order:
 *   1. reject empty / NUL-containing input
 *   2. expand `~` and `~/...`
 *   3. make absolute against the start directory captured at creation
 *   4. clean lexically (`.`, `..`, duplicate separators)
 *   5. lexical allow-list check
 *   6. realpath; the canonical path must stay inside the roots
 *   7. for missing targets, check the nearest existing ancestor instead
 *
 * Rejections are returned as values, never thrown.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { errnoCode, errorMessage } from './errors';

// ─── Types ──────────────────────────────────────────────────────────────────

export type SandboxViolationKind =
  | 'InvalidPath'
  | 'PathNotAllowed'
  | 'SymlinkEscape'
  | 'ParentMissing'
  | 'ResolutionError';

export class SandboxViolationError extends Error {
  readonly kind: SandboxViolationKind;

  constructor(kind: SandboxViolationKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SandboxViolationError';
    this.kind = kind;
  }
}

export type SandboxResult =
  | { ok: true; path: string }
  | { ok: false; error: SandboxViolationError };

/** Raised at startup when a configured root is unusable. */
export class RootValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RootValidationError';
  }
}

export interface PathSandboxOptions {
  /** Directory relative paths resolve against. Defaults to `process.cwd()` at creation. */
  startDir?: string;
  /** Home directory lookup for `~` expansion. */
  homeDir?: () => string | undefined;
}

// ─── Path Helpers ───────────────────────────────────────────────────────────

const MAX_LINK_HOPS = 40;

/** Home directory of the current user, or undefined when it cannot be determined. */
export function currentHomeDir(): string | undefined {
  try {
    const home = os.homedir();
    return home.length > 0 ? home : undefined;
  } catch {
    return undefined;
  }
}

/** Expand `~` and `~/rest`. `~user` stays literal. */
export function expandHome(p: string, home: string | undefined): string {
  if (home === undefined) return p;
  if (p === '~') return home;
  if (p.startsWith('~/')) return home + path.sep + p.slice(2);
  return p;
}

/** True when `candidate` equals a root or has one as a lexical ancestor. */
export function isWithinRoots(candidate: string, roots: readonly string[]): boolean {
  return roots.some((root) => {
    if (candidate === root) return true;
    const prefix = root.endsWith(path.sep) ? root : root + path.sep;
    return candidate.startsWith(prefix);
  });
}

function isMissingEntry(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

function allowed(p: string): SandboxResult {
  return { ok: true, path: p };
}

function rejected(kind: SandboxViolationKind, message: string, cause?: unknown): SandboxResult {
  return { ok: false, error: new SandboxViolationError(kind, message, cause) };
}

// ─── PathSandbox ────────────────────────────────────────────────────────────

export class PathSandbox {
  /** Allowed roots as configured: expanded, absolute, cleaned. */
  readonly roots: readonly string[];
  /** Roots plus their symlink-resolved forms. */
  private readonly prefixes: readonly string[];
  private readonly startDir: string;
  private readonly homeDir: () => string | undefined;

  private constructor(
    roots: readonly string[],
    canonicalRoots: readonly string[],
    startDir: string,
    homeDir: () => string | undefined,
  ) {
    this.roots = roots;
    this.prefixes = Array.from(new Set([...roots, ...canonicalRoots]));
    this.startDir = startDir;
    this.homeDir = homeDir;
  }

  /**
   * Validate and canonicalize the configured roots.
   * Throws `RootValidationError` when none are given or one is not an existing directory.
   */
  static async create(rawRoots: readonly string[], options: PathSandboxOptions = {}): Promise<PathSandbox> {
    const startDir = options.startDir ?? process.cwd();
    const homeDir = options.homeDir ?? currentHomeDir;

    if (rawRoots.length === 0) {
      throw new RootValidationError('no allowed directories specified');
    }

    const roots: string[] = [];
    const canonicalRoots: string[] = [];
    for (const raw of rawRoots) {
      if (raw.length === 0 || raw.includes('\0')) {
        throw new RootValidationError(`invalid allowed directory: ${JSON.stringify(raw)}`);
      }
      const root = path.resolve(startDir, expandHome(raw, homeDir()));
      let stat: Stats;
      try {
        stat = await fs.stat(root);
      } catch (err) {
        throw new RootValidationError(`allowed directory ${root} is not accessible: ${errorMessage(err)}`);
      }
      if (!stat.isDirectory()) {
        throw new RootValidationError(`allowed directory ${root} is not a directory`);
      }
      if (!roots.includes(root)) roots.push(root);
      canonicalRoots.push(await fs.realpath(root));
    }

    return new PathSandbox(roots, canonicalRoots, startDir, homeDir);
  }

  /** Map a client path to a canonical in-root path, or explain why not. */
  async resolve(requested: string): Promise<SandboxResult> {
    if (requested.length === 0) {
      return rejected('InvalidPath', 'invalid path: path is empty');
    }
    if (requested.includes('\0')) {
      return rejected('InvalidPath', 'invalid path: path contains a NUL byte');
    }

    const candidate = path.resolve(this.startDir, expandHome(requested, this.homeDir()));
    if (!isWithinRoots(candidate, this.roots)) {
      return rejected(
        'PathNotAllowed',
        `path not within allowed directories (allowed: ${this.roots.join(', ')})`,
      );
    }

    return this.canonicalize(candidate, 0);
  }

  private async canonicalize(candidate: string, hops: number): Promise<SandboxResult> {
    let real: string;
    try {
      real = await fs.realpath(candidate);
    } catch (err) {
      if (!isMissingEntry(err)) {
        return rejected('ResolutionError', `cannot resolve path: ${errorMessage(err)}`, err);
      }
      return this.resolveMissing(candidate, hops);
    }

    if (!isWithinRoots(real, this.prefixes)) {
      return rejected('SymlinkEscape', `symlink target ${real} is not within allowed directories`);
    }
    return allowed(real);
  }

  /**
   * The candidate does not resolve. A dangling symlink is judged by its
   * target; anything else by its nearest existing ancestor.
   */
  private async resolveMissing(candidate: string, hops: number): Promise<SandboxResult> {
    let current = candidate;

    for (;;) {
      const linkTarget = await this.readDanglingLink(current);
      if (linkTarget.kind === 'error') {
        return rejected('ResolutionError', `cannot resolve path: ${errorMessage(linkTarget.cause)}`, linkTarget.cause);
      }
      if (linkTarget.kind === 'link') {
        if (hops >= MAX_LINK_HOPS) {
          return rejected('ResolutionError', 'cannot resolve path: too many levels of symbolic links');
        }
        if (!isWithinRoots(linkTarget.target, this.prefixes)) {
          return rejected('SymlinkEscape', `symlink target ${linkTarget.target} is not within allowed directories`);
        }
        const verdict = await this.canonicalize(linkTarget.target, hops + 1);
        return verdict.ok ? allowed(candidate) : verdict;
      }

      const parent = path.dirname(current);
      if (parent === current || !isWithinRoots(parent, this.prefixes)) {
        return rejected('ParentMissing', `parent directory ${path.dirname(candidate)} does not exist`);
      }

      let realParent: string;
      try {
        realParent = await fs.realpath(parent);
      } catch (err) {
        if (!isMissingEntry(err)) {
          return rejected('ResolutionError', `cannot resolve path: ${errorMessage(err)}`, err);
        }
        current = parent;
        continue;
      }

      if (!isWithinRoots(realParent, this.prefixes)) {
        return rejected(
          'SymlinkEscape',
          `parent directory ${parent} resolves to symlink target ${realParent} outside allowed directories`,
        );
      }
      return allowed(candidate);
    }
  }

  private async readDanglingLink(
    p: string,
  ): Promise<{ kind: 'none' } | { kind: 'link'; target: string } | { kind: 'error'; cause: unknown }> {
    try {
      const stat = await fs.lstat(p);
      if (!stat.isSymbolicLink()) return { kind: 'none' };
      const target = await fs.readlink(p);
      return { kind: 'link', target: path.resolve(path.dirname(p), target) };
    } catch (err) {
      return isMissingEntry(err) ? { kind: 'none' } : { kind: 'error', cause: err };
    }
  }
}
