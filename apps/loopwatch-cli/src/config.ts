/**
 * CLI Config Store
 *
 * Persists harness preferences to:
 *   ~/.config/loopwatch/config.json (Linux/Mac)
 *   %APPDATA%\loopwatch\Config\config.json (Windows)
 *
 * Only the keys in SETTING_KEYS are accepted. Credentials never go here:
 * the agent API key is read from LOOPWATCH_AGENT_API_KEY at runtime.
 */

import Conf from 'conf'
import {
  HarnessConfigError,
  isSettingKey,
  parseLayer,
  resolveSettings,
  type StoredSettings,
} from '@loopwatch/harness-core'

const store = new Conf<StoredSettings>({
  projectName: 'loopwatch',
  // Owner read/write only
  configFileMode: 0o600,
})

const CREDENTIAL_KEY = /api[_-]?key|token|secret|password|credential/i

export const config = {
  get path(): string { return store.path },

  get stored(): StoredSettings { return store.store },

  /**
   * Parse and persist one key. The merged result is validated before it is
   * written, so a bad value never reaches the file.
   */
  set(key: string, raw: string): StoredSettings {
    if (CREDENTIAL_KEY.test(key)) {
      throw new HarnessConfigError(
        'Credentials are not stored. Set LOOPWATCH_AGENT_API_KEY in the environment instead.'
      )
    }
    if (!isSettingKey(key)) {
      throw new HarnessConfigError(`Unknown setting "${key}". Run: loopwatch config show`)
    }

    const patch = parseLayer(k => (k === key ? raw : undefined), 'config set')
    resolveSettings({ ...store.store, ...patch }, {})
    store.set(patch)
    return patch
  },

  reset(): void {
    store.clear()
  },
}
