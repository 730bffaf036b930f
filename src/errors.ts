/**
 * Raised at setup time when a field registry or store is wired incorrectly.
 * Runtime failures never use exceptions; they travel as actions.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`[fieldwise] ${message}`)
    this.name = 'ConfigurationError'
  }
}
