/**
 * Include/exclude rules.
 *
 * A rule is one pattern string as an analyser declared it:
 * - trailing `/` restricts the rule to directories
 * - leading `/` anchors it to the repository root
 * - a `/` anywhere else also makes it nested
 *
 * Nested rules are matched against the path relative to the root, others
 * against the bare entry name, so `*.md` matches anywhere while `/LICENSE`
 * matches only the root-level file.
 */
import picomatch from 'picomatch';
import { InvalidRuleError, ErrorCodes } from '../../utils/errors.js';
import type { RuleKind } from './types.js';

/**
 * Shell-style matching. `*` runs across `/` and `[!...]` negates a class.
 * Braces, extglobs and leading `!` are plain text, and dotfiles are
 * ordinary names. `?` matches one character other than `/`.
 */
const MATCH_OPTIONS: picomatch.PicomatchOptions = {
  bash: true,
  dot: true,
  posix: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
};

const GLOB_CHARS = /[*?[]/;

/** Characters picomatch compiles into regex groups even with extglobs off */
const GROUP_CHARS = new Set(['(', ')', '|']);

/**
 * Index of the `]` closing a bracket expression opened at `start`, or -1
 * when the `[` is unterminated. A `]` right after `[` or `[!` is a member.
 */
function bracketEnd(pattern: string, start: number): number {
  let index = start + 1;
  if (pattern.charAt(index) === '!') {
    index += 1;
  }
  if (pattern.charAt(index) === ']') {
    index += 1;
  }
  return pattern.indexOf(']', index);
}

/**
 * Put group characters in single-member classes so they match themselves.
 * Bracket expressions and backslash escapes are copied unchanged, and an
 * unterminated `[` is escaped.
 */
export function quoteGroupChars(pattern: string): string {
  let quoted = '';
  let index = 0;
  while (index < pattern.length) {
    const char = pattern.charAt(index);
    if (char === '\\') {
      quoted += pattern.slice(index, index + 2);
      index += 2;
      continue;
    }
    if (char === '[') {
      const end = bracketEnd(pattern, index);
      quoted += end === -1 ? '\\[' : pattern.slice(index, end + 1);
      index = end === -1 ? index + 1 : end + 1;
      continue;
    }
    quoted += GROUP_CHARS.has(char) ? `[${char}]` : char;
    index += 1;
  }
  return quoted;
}

export class Rule {
  /** Analyser ids routed to when this rule matches */
  private readonly ownerIds = new Set<string>();
  private readonly matcher: picomatch.Matcher;

  private constructor(
    /** Pattern exactly as declared */
    readonly source: string,
    /** Pattern with anchor and directory markers removed */
    readonly pattern: string,
    readonly kind: RuleKind,
    readonly isDirectory: boolean,
    readonly isAnchored: boolean,
    readonly isNested: boolean,
  ) {
    this.matcher = picomatch(quoteGroupChars(pattern), MATCH_OPTIONS);
  }

  /**
   * Parse a pattern string.
   *
   * @throws InvalidRuleError when the pattern is empty, or when an exclude
   * pattern is not in directory form
   */
  static parse(source: string, owner?: string, kind: RuleKind = 'include'): Rule {
    let pattern = source;

    const isDirectory = pattern.endsWith('/');
    if (isDirectory) {
      pattern = pattern.slice(0, -1);
    }

    const isAnchored = pattern.startsWith('/');
    if (isAnchored) {
      pattern = pattern.slice(1);
    }

    if (!pattern) {
      throw new InvalidRuleError(ErrorCodes.EMPTY_RULE, `Empty ${kind} rule: "${source}"`, {
        pattern: source,
        owner,
      });
    }

    if (kind === 'exclude' && !isDirectory) {
      throw new InvalidRuleError(
        ErrorCodes.INVALID_RULE,
        `Invalid exclude rule "${source}": exclude rules must end with "/"`,
        { pattern: source, owner }
      );
    }

    const rule = new Rule(source, pattern, kind, isDirectory, isAnchored, isAnchored || pattern.includes('/'));
    if (owner) {
      rule.addOwner(owner);
    }
    return rule;
  }

  /** Whether the pattern holds any glob metacharacter. */
  get isPattern(): boolean {
    return GLOB_CHARS.test(this.pattern);
  }

  get owners(): ReadonlySet<string> {
    return this.ownerIds;
  }

  /**
   * Record one more analyser interested in this pattern.
   * Only the rule-set builder calls this, before any scan starts.
   */
  addOwner(owner: string): void {
    this.ownerIds.add(owner);
  }

  /**
   * Match a candidate string against the pattern.
   */
  match(candidate: string): boolean {
    return this.matcher(candidate);
  }

  /**
   * Match an entry found during traversal, choosing the candidate the rule
   * is defined over.
   *
   * @param relativePath - Path relative to the repository root, `/`-separated
   * @param name - Entry name
   */
  matchEntry(relativePath: string, name: string): boolean {
    return this.match(this.isNested ? relativePath : name);
  }
}
