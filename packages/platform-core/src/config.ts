/**
 * @gridwarden/platform-core — Configuration
 *
 * Everything tunable comes from GRIDWARDEN_* environment variables, checked
 * once at startup. A bad value stops the platform with ConfigurationError
 * listing every problem, not just the first.
 */

import { readFileSync } from 'fs'
import { z } from 'zod'
import { ConfigurationError } from '@gridwarden/errors'
import type { DetectionConfig } from '@gridwarden/detection'
import type { TrustedKeyring } from '@gridwarden/patch-orchestrator'

export interface GridWardenConfig {
  detection: DetectionConfig
  patch: {
    failure_rate: number
    keys_file: string | null
    keyring: TrustedKeyring
  }
  feed: {
    interval_ms: number
  }
}

// Unset and empty both mean "use the default"
function numberVar(fallback: number) {
  return z.preprocess(
    v => (v === undefined || v === '' ? undefined : v),
    z.coerce.number().finite().default(fallback)
  )
}

const EnvSchema = z.object({
  GRIDWARDEN_BASELINE_WINDOW:              numberVar(30).pipe(z.number().int().positive()),
  GRIDWARDEN_BASELINE_MIN_SAMPLES:         numberVar(5).pipe(z.number().int().positive()),
  GRIDWARDEN_DEVIATION_THRESHOLD:          numberVar(3).pipe(z.number().positive()),
  GRIDWARDEN_DEVIATION_CRITICAL_THRESHOLD: numberVar(5).pipe(z.number().positive()),
  GRIDWARDEN_VOLTAGE_MIN:                  numberVar(200),
  GRIDWARDEN_VOLTAGE_MAX:                  numberVar(260),
  GRIDWARDEN_FREQUENCY_MIN:                numberVar(58.5),
  GRIDWARDEN_FREQUENCY_MAX:                numberVar(61.5),
  GRIDWARDEN_FAILED_LOGIN_LIMIT:           numberVar(5).pipe(z.number().int().nonnegative()),
  GRIDWARDEN_BAD_STATUSES:                 z.string().default('tampered,compromised,fault'),
  GRIDWARDEN_PATCH_FAILURE_RATE:           numberVar(0).pipe(z.number().min(0).max(1)),
  GRIDWARDEN_PATCH_KEYS_FILE:              z.string().optional(),
  GRIDWARDEN_FEED_INTERVAL_MS:             numberVar(6000).pipe(z.number().int().min(100)),
}).superRefine((env, ctx) => {
  if (env.GRIDWARDEN_DEVIATION_CRITICAL_THRESHOLD < env.GRIDWARDEN_DEVIATION_THRESHOLD) {
    ctx.addIssue({
      code:    z.ZodIssueCode.custom,
      path:    ['GRIDWARDEN_DEVIATION_CRITICAL_THRESHOLD'],
      message: 'must not be below GRIDWARDEN_DEVIATION_THRESHOLD',
    })
  }
  if (env.GRIDWARDEN_BASELINE_MIN_SAMPLES > env.GRIDWARDEN_BASELINE_WINDOW) {
    ctx.addIssue({
      code:    z.ZodIssueCode.custom,
      path:    ['GRIDWARDEN_BASELINE_MIN_SAMPLES'],
      message: 'must not exceed GRIDWARDEN_BASELINE_WINDOW',
    })
  }
  if (env.GRIDWARDEN_VOLTAGE_MIN >= env.GRIDWARDEN_VOLTAGE_MAX) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GRIDWARDEN_VOLTAGE_MIN'], message: 'must be below GRIDWARDEN_VOLTAGE_MAX' })
  }
  if (env.GRIDWARDEN_FREQUENCY_MIN >= env.GRIDWARDEN_FREQUENCY_MAX) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['GRIDWARDEN_FREQUENCY_MIN'], message: 'must be below GRIDWARDEN_FREQUENCY_MAX' })
  }
})

const KeyringSchema = z.record(z.string().min(1), z.string().includes('PUBLIC KEY', { message: 'must be a PEM public key' }))

export function loadKeyring(file: string): TrustedKeyring {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'))
  } catch (err) {
    throw new ConfigurationError([
      `GRIDWARDEN_PATCH_KEYS_FILE: cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`,
    ])
  }
  const parsed = KeyringSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(i => `GRIDWARDEN_PATCH_KEYS_FILE: ${[...i.path].join('.')}: ${i.message}`))
  }
  return parsed.data
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): GridWardenConfig {
  const parsed = EnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`))
  }
  const e = parsed.data
  const keys_file = e.GRIDWARDEN_PATCH_KEYS_FILE?.trim() || null

  return {
    detection: {
      rules: {
        voltage_min:        e.GRIDWARDEN_VOLTAGE_MIN,
        voltage_max:        e.GRIDWARDEN_VOLTAGE_MAX,
        frequency_min:      e.GRIDWARDEN_FREQUENCY_MIN,
        frequency_max:      e.GRIDWARDEN_FREQUENCY_MAX,
        failed_login_limit: e.GRIDWARDEN_FAILED_LOGIN_LIMIT,
        bad_statuses:       e.GRIDWARDEN_BAD_STATUSES
          .split(',')
          .map(s => s.trim().toLowerCase())
          .filter(Boolean),
      },
      deviation: {
        window:             e.GRIDWARDEN_BASELINE_WINDOW,
        min_samples:        e.GRIDWARDEN_BASELINE_MIN_SAMPLES,
        threshold:          e.GRIDWARDEN_DEVIATION_THRESHOLD,
        critical_threshold: e.GRIDWARDEN_DEVIATION_CRITICAL_THRESHOLD,
      },
    },
    patch: {
      failure_rate: e.GRIDWARDEN_PATCH_FAILURE_RATE,
      keys_file,
      keyring:      keys_file ? loadKeyring(keys_file) : {},
    },
    feed: {
      interval_ms: e.GRIDWARDEN_FEED_INTERVAL_MS,
    },
  }
}
