/**
 * Decision Engine — Change Classification
 *
 * Maps changed file paths to impact categories using glob rules.
 * Classification is deterministic and attributes every file to at least one
 * category: files no rule claims fall into `unclassified`, which downstream
 * planning treats conservatively (never skip-safe).
 *
 * Matching is case-sensitive glob matching (picomatch) against the
 * repository-relative path; dotfiles are matched like any other file.
 */

import picomatch from 'picomatch';

import { ConfigurationError, InputError } from '../errors/errors.ts';
import {
  type CategoryMatch,
  type ChangeSet,
  type ClassificationResult,
  type FileAttribution,
  type PatternRule,
  UNCLASSIFIED,
} from './types.ts';

type Matcher = (path: string) => boolean;

export interface CompiledRule {
  readonly category: string;
  readonly isMatch: Matcher;
}

const MATCH_OPTIONS = { dot: true, nocase: false } as const;

/* -------------------------------------------------------------------------- */
/* Rule compilation                                                           */
/* -------------------------------------------------------------------------- */

function compilePatterns(category: string, patterns: readonly string[]): Matcher {
  if (patterns.length === 0) {
    throw new ConfigurationError(
      'CONFIG_INVALID_PATTERN',
      `Rule "${category}" must declare at least one pattern`,
      { details: { subject: category } },
    );
  }

  for (const pattern of patterns) {
    if (pattern.trim().length === 0) {
      throw new ConfigurationError(
        'CONFIG_INVALID_PATTERN',
        `Rule "${category}" has an empty pattern`,
        { details: { subject: category } },
      );
    }
  }

  try {
    return picomatch([...patterns], MATCH_OPTIONS);
  } catch (error) {
    throw new ConfigurationError(
      'CONFIG_INVALID_PATTERN',
      `Rule "${category}" has an invalid pattern: ${patterns.join(', ')}`,
      { cause: error, details: { subject: category } },
    );
  }
}

/**
 * Validate the rule set and build one matcher per category.
 *
 * @throws {ConfigurationError} when the rule set is empty or a rule is malformed.
 */
export function compileRules(ruleSet: readonly PatternRule[]): readonly CompiledRule[] {
  if (ruleSet.length === 0) {
    throw new ConfigurationError('CONFIG_INVALID', 'Rule set must contain at least one rule');
  }

  const seen = new Set<string>();
  return ruleSet.map((rule) => {
    const category = rule.category.trim();
    if (category.length === 0) {
      throw new ConfigurationError('CONFIG_INVALID', 'Rule category names must not be empty');
    }
    if (category === UNCLASSIFIED) {
      throw new ConfigurationError(
        'CONFIG_INVALID',
        `Rule category "${UNCLASSIFIED}" is reserved for files no rule matches`,
        { details: { subject: category } },
      );
    }
    if (seen.has(category)) {
      throw new ConfigurationError(
        'CONFIG_DUPLICATE',
        `Rule category "${category}" is declared twice`,
        { details: { subject: category } },
      );
    }
    seen.add(category);

    return { category, isMatch: compilePatterns(category, rule.patterns) };
  });
}

/* -------------------------------------------------------------------------- */
/* Change set normalization                                                   */
/* -------------------------------------------------------------------------- */

function rejectPath(path: string, problem: string): never {
  throw new InputError('INPUT_INVALID_CHANGE_SET', `Invalid changed path "${path}": ${problem}`, {
    details: { path },
  });
}

/**
 * Validate and normalize a change set: strips a leading `./` and drops
 * repeated paths (first occurrence wins).
 *
 * @throws {InputError} for empty, absolute, escaping or non-POSIX paths.
 */
export function normalizeChangeSet(changeSet: ChangeSet): readonly string[] {
  const seen = new Set<string>();
  const files: string[] = [];

  for (const raw of changeSet) {
    if (typeof raw !== 'string' || raw.trim().length === 0) {
      rejectPath(String(raw), 'path is empty');
    }
    if (raw.includes('\0')) {
      rejectPath(raw, 'path contains a NUL byte');
    }
    if (raw.includes('\\')) {
      rejectPath(raw, 'use forward slashes');
    }

    let path = raw;
    while (path.startsWith('./')) {
      path = path.slice(2);
    }

    if (path.startsWith('/')) {
      rejectPath(raw, 'path must be relative to the repository root');
    }
    if (path.split('/').includes('..')) {
      rejectPath(raw, 'path escapes the repository root');
    }
    if (path.length === 0) {
      rejectPath(raw, 'path is empty');
    }

    if (!seen.has(path)) {
      seen.add(path);
      files.push(path);
    }
  }

  return files;
}

/* -------------------------------------------------------------------------- */
/* Classification                                                             */
/* -------------------------------------------------------------------------- */

/**
 * Classify a change set against a rule set.
 *
 * @example
 * const result = classify(['README.md', 'src/app.py'], [
 *   { category: 'docs', patterns: ['*.md'] },
 *   { category: 'source', patterns: ['src/**'] },
 * ]);
 * // matchedCategories(result) -> ['docs', 'source']
 */
export function classify(
  changeSet: ChangeSet,
  ruleSet: readonly PatternRule[],
): ClassificationResult {
  const rules = compileRules(ruleSet);
  const files = normalizeChangeSet(changeSet);

  const buckets: Array<CompiledRule & { files: string[] }> = rules.map((rule) => ({
    ...rule,
    files: [],
  }));
  const unclassified: string[] = [];
  const attributions: FileAttribution[] = [];

  for (const file of files) {
    const categories: string[] = [];
    for (const bucket of buckets) {
      if (bucket.isMatch(file)) {
        bucket.files.push(file);
        categories.push(bucket.category);
      }
    }

    if (categories.length === 0) {
      unclassified.push(file);
      categories.push(UNCLASSIFIED);
    }
    attributions.push({ file, categories });
  }

  const categories: CategoryMatch[] = [
    ...buckets.map(({ category, files: matched }) => ({
      category,
      matched: matched.length > 0,
      files: matched,
    })),
    { category: UNCLASSIFIED, matched: unclassified.length > 0, files: unclassified },
  ];

  return { files, categories, attributions };
}

/**
 * Names of the categories at least one file fell into, in declaration order.
 */
export function matchedCategories(result: ClassificationResult): readonly string[] {
  return result.categories.filter((c) => c.matched).map((c) => c.category);
}

/**
 * Category names the rule set declared (excludes `unclassified`).
 */
export function declaredCategories(result: ClassificationResult): readonly string[] {
  return result.categories.map((c) => c.category).filter((c) => c !== UNCLASSIFIED);
}
