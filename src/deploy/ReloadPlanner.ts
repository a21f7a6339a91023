/**
 * Maps changed configuration files to the host subsystems that must reload.
 *
 * Works entirely on path strings from `git diff --name-only`, with no
 * filesystem or git access. Every rule a path matches contributes; matching
 * never stops at the first hit.
 */

// ─── Domains ─────────────────────────────────────────────────────

export const INPUT_HELPER_DOMAINS = [
  'input_boolean',
  'input_select',
  'input_text',
  'input_number',
  'input_datetime',
] as const;

/** Fixed enumeration; plans always list domains in this order. */
export const RELOAD_DOMAINS = ['automation', 'script', 'group', 'scene', 'template', ...INPUT_HELPER_DOMAINS] as const;

export type ReloadDomain = (typeof RELOAD_DOMAINS)[number];

export function isReloadDomain(value: string): value is ReloadDomain {
  return (RELOAD_DOMAINS as readonly string[]).includes(value);
}

// ─── Rules ───────────────────────────────────────────────────────

export interface ReloadRule {
  /** Repo-relative path; `*` matches any run of characters, `/` included */
  pattern: string;
  domains: readonly ReloadDomain[];
  restartRequired: boolean;
}

/**
 * Versioned contract: append new rows, never remove or reorder.
 */
export const RELOAD_RULES: readonly ReloadRule[] = [
  { pattern: 'automations.yaml', domains: ['automation'], restartRequired: false },
  { pattern: 'scripts.yaml', domains: ['script'], restartRequired: false },
  { pattern: 'groups.yaml', domains: ['group'], restartRequired: false },
  { pattern: 'scenes.yaml', domains: ['scene'], restartRequired: false },
  { pattern: 'configuration.yaml', domains: ['group', 'template', ...INPUT_HELPER_DOMAINS], restartRequired: true },
  { pattern: 'customize.yaml', domains: [], restartRequired: true },
  { pattern: 'packages/*.yaml', domains: [], restartRequired: true },
  { pattern: 'automations/*.yaml', domains: ['automation'], restartRequired: false },
  { pattern: 'scripts/*.yaml', domains: ['script'], restartRequired: false },
  { pattern: 'scenes/*.yaml', domains: ['scene'], restartRequired: false },
  { pattern: 'templates/*.yaml', domains: ['template'], restartRequired: false },
];

// ─── Plan ────────────────────────────────────────────────────────

export interface ReloadPlan {
  domains: ReloadDomain[];
  restartRequired: boolean;
  /** Changed paths that matched no rule */
  unmatched: string[];
}

export function planReload(changedFiles: Iterable<string>, rules: readonly ReloadRule[] = RELOAD_RULES): ReloadPlan {
  const domains = new Set<ReloadDomain>();
  const unmatched = new Set<string>();
  let restartRequired = false;

  for (const filePath of new Set(Array.from(changedFiles, normalizePath))) {
    let matched = false;
    for (const rule of rules) {
      if (!matchesPattern(filePath, rule.pattern)) continue;
      matched = true;
      for (const domain of rule.domains) domains.add(domain);
      restartRequired = restartRequired || rule.restartRequired;
    }
    if (!matched) unmatched.add(filePath);
  }

  return {
    domains: RELOAD_DOMAINS.filter((d) => domains.has(d)),
    restartRequired,
    unmatched: Array.from(unmatched).sort(),
  };
}

// ─── Matching ────────────────────────────────────────────────────

const patternCache = new Map<string, RegExp>();

export function matchesPattern(filePath: string, pattern: string): boolean {
  let regex = patternCache.get(pattern);
  if (!regex) {
    const source = pattern
      .split('*')
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*');
    regex = new RegExp(`^${source}$`);
    patternCache.set(pattern, regex);
  }
  return regex.test(filePath);
}

export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^(\.\/)+/, '');
}
