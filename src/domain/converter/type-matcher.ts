const CATCH_ALL = '*';
const EXCLUDE_PREFIX = '!';

/**
 * Translates a shell glob to an anchored regular expression.
 *
 * `*` matches any run of characters (dots included), `?` exactly one,
 * `[seq]` / `[!seq]` a character class. Everything else is literal.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const c = pattern.charAt(i);
    i++;

    if (c === '*') {
      source += '.*';
    } else if (c === '?') {
      source += '.';
    } else if (c === '[') {
      let j = i;
      if (pattern.charAt(j) === '!') j++;
      if (pattern.charAt(j) === ']') j++;
      while (j < pattern.length && pattern.charAt(j) !== ']') j++;

      if (j >= pattern.length) {
        // No closing bracket: the '[' is literal.
        source += '\\[';
      } else {
        const body = pattern.slice(i, j);
        const negate = body.startsWith('!');
        const members = (negate ? body.slice(1) : body).replace(/[\\[\]^]/g, '\\$&');
        source += `[${negate ? '^' : ''}${members}]`;
        i = j + 1;
      }
    } else {
      source += c.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
    }
  }

  return new RegExp(`^${source}$`, 's');
}

/**
 * Decides which notification event types a definition accepts.
 *
 * Built from a single pattern or a list of patterns. Entries starting with
 * `!` exclude, all others include. A list made only of exclusions means
 * "everything except", so `*` is added to the includes in that case.
 */
export class TypeMatcher {
  private readonly includeRegExps: readonly RegExp[];
  private readonly excludeRegExps: readonly RegExp[];

  private constructor(
    readonly includes: readonly string[],
    readonly excludes: readonly string[],
  ) {
    this.includeRegExps = includes.map(globToRegExp);
    this.excludeRegExps = excludes.map(globToRegExp);
  }

  static build(eventType: string | readonly string[]): TypeMatcher {
    const patterns = typeof eventType === 'string' ? [eventType] : eventType;
    const includes: string[] = [];
    const excludes: string[] = [];

    for (const pattern of patterns) {
      if (pattern.startsWith(EXCLUDE_PREFIX)) {
        excludes.push(pattern.slice(EXCLUDE_PREFIX.length));
      } else {
        includes.push(pattern);
      }
    }

    if (excludes.length > 0 && includes.length === 0) {
      includes.push(CATCH_ALL);
    }

    return new TypeMatcher(includes, excludes);
  }

  included(eventType: string): boolean {
    return this.includeRegExps.some((re) => re.test(eventType));
  }

  excluded(eventType: string): boolean {
    return this.excludeRegExps.some((re) => re.test(eventType));
  }

  matches(eventType: string): boolean {
    return this.included(eventType) && !this.excluded(eventType);
  }

  /** True when every event type is accepted: `*` included, nothing excluded. */
  isCatchAll(): boolean {
    return this.includes.includes(CATCH_ALL) && this.excludes.length === 0;
  }

  toString(): string {
    return [...this.includes, ...this.excludes.map((p) => `${EXCLUDE_PREFIX}${p}`)].join(', ');
  }
}
