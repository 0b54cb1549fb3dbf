import picomatch from "picomatch";

export type PathMatcher = (relPath: string) => boolean;

export interface MatchOptions {
  /** Defaults to the host convention: case-insensitive on Windows only. */
  nocase?: boolean;
}

export const hostIsCaseInsensitive = (): boolean => process.platform === "win32";

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * Translate one shell-style pattern to a regex source. Only `*`, `?` and
 * `[...]` are special; everything else, `/` included, is literal text.
 */
export function shellPatternSource(pattern: string): string {
  let out = "";
  let i = 0;
  let prevStar = false;
  while (i < pattern.length) {
    const c = pattern.charAt(i++);
    if (c === "*") {
      // runs of * collapse
      if (!prevStar) out += ".*";
      prevStar = true;
      continue;
    }
    prevStar = false;
    if (c === "?") {
      out += ".";
    } else if (c === "[") {
      let j = i;
      if (pattern.charAt(j) === "!") j++;
      if (pattern.charAt(j) === "]") j++;
      while (j < pattern.length && pattern.charAt(j) !== "]") j++;
      if (j >= pattern.length) {
        // unclosed bracket is a literal [
        out += "\\[";
        continue;
      }
      const negate = pattern.charAt(i) === "!";
      let body = pattern.slice(negate ? i + 1 : i, j).replace(/\\/g, "\\\\");
      if (body.startsWith("]")) body = "\\" + body;
      else if (!negate && body.startsWith("^")) body = "\\" + body;
      out += `[${negate ? "^" : ""}${body}]`;
      i = j + 1;
    } else {
      out += escapeRegex(c);
    }
  }
  return out;
}

/**
 * Compile exclusion patterns with shell-style (fnmatch) semantics: each
 * pattern must match the whole relative path, `*` and `?` also cross `/`,
 * and dotfiles are not special. There is no negation, grouping or braces.
 */
export function compileExclusions(patterns: readonly string[], opts: MatchOptions = {}): PathMatcher {
  if (patterns.length === 0) return () => false;
  const source = patterns.map((p) => `(?:${shellPatternSource(p)})`).join("|");
  const re = new RegExp(`^(?:${source})$`, (opts.nocase ?? hostIsCaseInsensitive()) ? "is" : "s");
  return (relPath) => re.test(relPath);
}

/**
 * Ordinary glob matching (`*` stays within a segment, `**` crosses them),
 * used for redaction targets.
 */
export function compileGlobs(patterns: readonly string[], opts: { nocase?: boolean } = {}): PathMatcher {
  if (patterns.length === 0) return () => false;
  return picomatch([...patterns], { dot: true, nocase: opts.nocase ?? true });
}
