/**
 * CLI Config Store
 *
 * Persists the operator identity and the trusted keyring location to:
 *   ~/.config/gridwarden-nodejs/config.json (Linux)
 *   ~/Library/Preferences/gridwarden-nodejs/config.json (Mac)
 *
 * Uses the 'conf' package which handles platform-appropriate paths,
 * file permissions (600), and atomic writes.
 */

import Conf from 'conf'

type OperatorSettings = {
  operator:  string
  keys_file: string | null
}

export interface OperatorConfig {
  readonly operator: string
  readonly keysFile: string | null
  readonly path: string
  setOperator(name: string): void
  setKeysFile(file: string | null): void
}

export function createOperatorConfig(options: { cwd?: string } = {}): OperatorConfig {
  const store = new Conf<OperatorSettings>({
    projectName: 'gridwarden',
    cwd:         options.cwd,
    defaults: {
      operator:  'operator',
      keys_file: null,
    },
    // Restrict file permissions to owner-read-write only
    configFileMode: 0o600,
  })

  return {
    get operator(): string          { return store.get('operator') },
    get keysFile(): string | null   { return store.get('keys_file') },
    get path(): string              { return store.path },

    setOperator(name: string) {
      const trimmed = name.trim()
      if (!trimmed) throw new Error('Operator name must not be empty')
      store.set('operator', trimmed)
    },

    setKeysFile(file: string | null) {
      store.set('keys_file', file)
    },
  }
}
