/**
 * Formatted output helpers for CLI display.
 *
 * @internal
 */

import type { NamedKeyConfig } from 'oidc-keyring'

/** Check if stdout is a TTY at call time (not module load time). */
function isTTY(): boolean {
  return process.stdout.isTTY ?? false
}

/** Wrap text in ANSI bold if stdout is a TTY. */
export function bold(text: string): string {
  return isTTY() ? `\x1b[1m${text}\x1b[22m` : text
}

/** Format an error for display on stderr. */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`
  }
  return String(err)
}

/** Render a named key configuration as aligned `field value` lines. */
export function formatKeyConfig(config: NamedKeyConfig): string {
  const rows: [string, string][] = [
    ['name', config.name],
    ['algorithm', config.algorithm],
    ['rotation_period', config.rotationPeriod],
    ['verification_ttl', config.verificationTtl],
    ['audience', config.audience],
  ]
  const width = Math.max(...rows.map(([field]) => field.length))
  return rows.map(([field, value]) => `${bold(field.padEnd(width))}  ${value}\n`).join('')
}
