/**
 * Raised at startup when tuning values cannot produce a drawable wave.
 *
 * `field` names the offending setting (e.g. "baseOscillations") so the CLI
 * can point at the config key.
 */
export class ConfigurationError extends Error {
  readonly field: string
  readonly reason: string

  constructor(field: string, reason: string) {
    super(`Invalid configuration for "${field}": ${reason}`)
    this.name = 'ConfigurationError'
    this.field = field
    this.reason = reason
  }
}
