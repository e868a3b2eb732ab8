export const DEFAULT_MAX_TITLE_LENGTH = 50;

/** Boilerplate the upstream generator appends to article titles. */
export interface TitleRules {
  /** Publication names that appear after a dash or pipe, e.g. `"Rates Rise - Bloomberg"`. */
  sources: string[];

  /** Section names that appear after a colon, e.g. `"Stocks Slide: Markets Wrap"`. */
  sectionMarkers: string[];
}

export const DEFAULT_TITLE_RULES: TitleRules = {
  sources: ["Bloomberg"],
  sectionMarkers: ["Markets Wrap"],
};

/** Natural break points, in order of preference. */
const BREAK_TOKENS = [":", " - ", " – ", ", "];

/** A break-point segment shorter than this reads as a fragment rather than a title. */
const MIN_SEGMENT_LENGTH = 20;

/** The word-boundary cut may only move back into the last 40% of the budget. */
const WORD_BOUNDARY_RATIO = 0.6;

const ELLIPSIS = "...";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const patternCache = new Map<string, RegExp[]>();

function suffixPatterns(rules: TitleRules): RegExp[] {
  const key = JSON.stringify(rules);
  const cached = patternCache.get(key);
  if (cached) {
    return cached;
  }

  const patterns: RegExp[] = [];
  const sources = rules.sources.map(escapeRegExp).join("|");

  if (sources) {
    patterns.push(new RegExp(`\\s*[-–—]\\s*(?:${sources}).*$`, "i"));
  }
  patterns.push(/\s*\(\d+\)\s*$/);
  if (sources) {
    patterns.push(new RegExp(`\\s*\\|\\s*(?:${sources}).*$`, "i"));
  }
  for (const marker of rules.sectionMarkers) {
    const words = marker.trim().split(/\s+/).map(escapeRegExp).join("\\s*");
    patterns.push(new RegExp(`\\s*:\\s*${words}\\s*$`, "i"));
  }

  patternCache.set(key, patterns);
  return patterns;
}

/** Removes boilerplate suffixes until none is left. */
export function stripTitleSuffixes(
  title: string,
  rules: TitleRules = DEFAULT_TITLE_RULES,
): string {
  const patterns = suffixPatterns(rules);
  let current = title;

  for (;;) {
    let next = current;
    for (const pattern of patterns) {
      next = next.replace(pattern, "");
    }
    if (next === current) {
      return current;
    }
    current = next;
  }
}

/**
 * Shortens an article title for display in a table of contents.
 *
 * Boilerplate suffixes are removed first; a title that then fits is returned as is. Longer
 * titles are cut at the first natural break point that leaves a substantial segment, and
 * failing that truncated at a word boundary with an ellipsis.
 */
export function shortenTitle(
  title: string,
  maxLength: number = DEFAULT_MAX_TITLE_LENGTH,
  rules: TitleRules = DEFAULT_TITLE_RULES,
): string {
  const stripped = stripTitleSuffixes(title, rules);
  // Lengths are counted in code points so that a cut never splits a surrogate pair.
  const characters = Array.from(stripped);

  if (characters.length <= maxLength) {
    return stripped.trim();
  }

  for (const token of BREAK_TOKENS) {
    const index = stripped.indexOf(token);
    if (index === -1) {
      continue;
    }

    const segment = stripped.slice(0, index);
    const segmentLength = Array.from(segment).length;
    if (segmentLength >= MIN_SEGMENT_LENGTH && segmentLength <= maxLength) {
      // A segment can end in its own boilerplate, e.g. "Oil Rallies for Third Day (2): ...".
      return stripTitleSuffixes(segment, rules).trim();
    }
  }

  let kept = characters.slice(0, Math.max(0, maxLength - ELLIPSIS.length));
  const lastSpace = kept.lastIndexOf(" ");
  if (lastSpace > maxLength * WORD_BOUNDARY_RATIO) {
    kept = kept.slice(0, lastSpace);
  }

  return stripTitleSuffixes(kept.join("").trim() + ELLIPSIS, rules).trim();
}
