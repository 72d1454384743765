/**
 * Environment allow-list filtering.
 *
 * Only a small closed set of variables may cross the process boundary. A
 * variable matches an allowed name only when the name is followed directly
 * by `=`, so `DESKTOP_USERNAME_OTHER=x` never passes as `DESKTOP_USERNAME`.
 *
 * @module
 */

/**
 * Variables the desktop host sends to, or expects back from, the trampoline.
 */
export const DESKTOP_ENV_ALLOW_LIST: readonly string[] = Object.freeze([
  'DESKTOP_TRAMPOLINE_IDENTIFIER',
  'DESKTOP_TRAMPOLINE_TOKEN',
  'DESKTOP_USERNAME',
  'DESKTOP_ENDPOINT'
])

/**
 * Pure filter over `NAME=VALUE` entries.
 */
export type EnvFilter = (entries: readonly string[]) => string[]

/**
 * True if `entry` is a `NAME=VALUE` string whose name is exactly `name`.
 */
export function matchesEnvName(entry: string, name: string): boolean {
  return entry.startsWith(name) && entry.charAt(name.length) === '='
}

/**
 * Build a filter for a fixed allow-list.
 *
 * The list is copied, so later changes to the caller's array have no effect.
 * Output keeps the input order; duplicates are neither sorted nor removed.
 *
 * @throws Error if a name is empty or contains `=`
 */
export function createEnvFilter(allowList: readonly string[]): EnvFilter {
  for (const name of allowList) {
    if (name === '' || name.includes('=')) {
      throw new Error(`invalid allow-list name: ${JSON.stringify(name)}`)
    }
  }
  const names: readonly string[] = Object.freeze([...allowList])

  return (entries) => entries.filter((entry) => names.some((name) => matchesEnvName(entry, name)))
}

/**
 * Flatten an environment record into `NAME=VALUE` entries, in its own
 * iteration order. Unset (undefined) values are skipped.
 */
export function environmentEntries(env: Readonly<Record<string, string | undefined>>): string[] {
  const entries: string[] = []
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined) {
      entries.push(`${name}=${value}`)
    }
  }
  return entries
}
