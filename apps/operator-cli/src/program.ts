/**
 * GridWarden Operator CLI — command definitions
 *
 * Commands:
 *   gridwarden components              — list registered components
 *   gridwarden register <name>         — register a component
 *   gridwarden replay <file>           — ingest recorded telemetry from JSON
 *   gridwarden scenarios               — list attack drills
 *   gridwarden simulate <attack>       — run an attack drill against a component
 *   gridwarden keygen                  — create an Ed25519 signing key pair
 *   gridwarden sign <image>            — sign a firmware image for one target
 *   gridwarden patch <component> <v>   — roll out a signed firmware image
 *   gridwarden events                  — list security events
 *   gridwarden summary                 — counts plus the latest events
 *   gridwarden feed                    — play the demo microgrid
 *   gridwarden config set-operator     — change the acting operator name
 *
 * Every command runs in-process against the in-memory stores. Unless
 * --no-seed is given, the demo microgrid nodes are registered first.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs'
import { join } from 'path'
import { Command, InvalidArgumentError } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import { z } from 'zod'
import { isGridWardenError } from '@gridwarden/errors'
import { generateSigningKeyPair, signPatchPayload } from '@gridwarden/patch-orchestrator'
import type { GridWardenPlatform } from '@gridwarden/platform-core'
import { CRITICALITIES, type EventSeverity } from '@gridwarden/types'
import type { OperatorConfig } from './config'
import {
  componentRows,
  eventRows,
  fmtPatchState,
  historyRows,
  renderTable,
} from './format'

// ─── Wiring ───────────────────────────────────────────────────────────────────

export interface CliIO {
  out(line?: string): void
  err(line: string): void
  setExitCode(code: number): void
  /** Spinners only when a person is watching. */
  interactive: boolean
}

export interface ProgramDeps {
  io: CliIO
  settings: OperatorConfig
  createPlatform(keys_file: string | null): GridWardenPlatform
}

export const consoleIO: CliIO = {
  out:         (line = '') => console.log(line),
  err:         line => console.error(line),
  setExitCode: code => { process.exitCode = code },
  interactive: Boolean(process.stdout.isTTY),
}

// ─── Option parsers ───────────────────────────────────────────────────────────

function positiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.')
  return n
}

function nonNegativeInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Must be zero or a positive integer.')
  return n
}

const SEVERITIES: readonly EventSeverity[] = ['info', 'warning', 'critical']

function severity(value: string): EventSeverity {
  const match = SEVERITIES.find(s => s === value)
  if (!match) throw new InvalidArgumentError(`Expected one of: ${SEVERITIES.join(', ')}.`)
  return match
}

function criticality(value: string) {
  const match = CRITICALITIES.find(c => c === value)
  if (!match) throw new InvalidArgumentError(`Expected one of: ${CRITICALITIES.join(', ')}.`)
  return match
}

// ─── Replay file ──────────────────────────────────────────────────────────────

const ReplayReadingSchema = z.object({
  component: z.string().min(1),
  payload:   z.unknown(),
  timestamp: z.string().optional(),
})

const ReplayFileSchema = z.union([
  z.array(ReplayReadingSchema).transform(readings => ({ components: [], readings })),
  z.object({
    components: z.array(z.object({
      name:             z.string(),
      category:         z.string(),
      firmware_version: z.string(),
      network_address:  z.string(),
      criticality:      z.enum(['low', 'medium', 'high', 'critical']).optional(),
    })).default([]),
    readings: z.array(ReplayReadingSchema),
  }),
])

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(file, 'utf8'))
}

// ─── Program ──────────────────────────────────────────────────────────────────

export function buildProgram(deps: ProgramDeps): Command {
  const { io, settings } = deps
  const $ = chalk
  const program = new Command()

  const ok   = (msg: string) => io.out(`${$.green('✓')} ${msg}`)
  const warn = (msg: string) => io.out(`${$.yellow('⚠')} ${msg}`)
  const fail = (msg: string) => { io.err(`${$.red('✗')} ${msg}`); io.setExitCode(1) }
  const table = (rows: string[][]) => { for (const line of renderTable(rows)) io.out(line) }

  function spinner(text: string): ora.Ora {
    return ora({ text, isSilent: !io.interactive }).start()
  }

  /** Opens a platform for one command, reports domain errors, always shuts down. */
  async function run(
    fn: (platform: GridWardenPlatform) => Promise<void>,
    options: { keys_file?: string | null } = {}
  ): Promise<void> {
    let platform: GridWardenPlatform | null = null
    try {
      platform = deps.createPlatform(options.keys_file ?? settings.keysFile)
      if (program.opts<{ seed: boolean }>().seed) await platform.feed.registerNodes()
      await fn(platform)
    } catch (err) {
      if (isGridWardenError(err)) {
        fail(err.message)
      } else {
        fail(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`)
      }
    } finally {
      platform?.shutdown()
    }
  }

  /** Aborts on Ctrl-C until released. */
  function untilInterrupted(): { signal: AbortSignal; release(): void } {
    const controller = new AbortController()
    const onSigint = () => controller.abort()
    process.once('SIGINT', onSigint)
    return { signal: controller.signal, release: () => { process.off('SIGINT', onSigint) } }
  }

  async function runTicks(platform: GridWardenPlatform, ticks: number): Promise<void> {
    if (ticks === 0) return
    const s = spinner(`Playing ${ticks} feed tick(s)…`)
    let events = 0
    for (let i = 0; i < ticks; i++) {
      events += (await platform.feed.nudge()).events
      s.text = `Playing feed tick ${i + 1}/${ticks}…`
    }
    s.succeed(`${ticks} feed tick(s), ${events} event(s)`)
  }

  program
    .name('gridwarden')
    .description('GridWarden — microgrid intrusion detection and firmware rollout CLI')
    .version('0.1.0')
    .option('--no-seed', 'Start without the demo microgrid nodes')
    .exitOverride()
    .configureOutput({
      writeOut: str => io.out(str.trimEnd()),
      writeErr: str => io.err(str.trimEnd()),
    })

  // ─── Components ─────────────────────────────────────────────────────────────

  program
    .command('components')
    .description('List registered components')
    .action(() => run(async (platform) => {
      const list = await platform.registry.list()
      if (list.length === 0) { warn('No components registered'); return }
      table(componentRows(list))
      io.out()
      ok(`${list.length} component(s)`)
    }))

  program
    .command('register <name>')
    .description('Register a component')
    .requiredOption('--category <category>', 'e.g. inverter, battery, smart-meter')
    .requiredOption('--firmware <version>',  'Installed firmware version')
    .requiredOption('--address <address>',   'Network address')
    .option('--criticality <level>', `One of ${CRITICALITIES.join(', ')}`, criticality, 'medium')
    .action((name: string, opts: { category: string; firmware: string; address: string; criticality: string }) =>
      run(async (platform) => {
        const component = await platform.registry.register({
          name,
          category:         opts.category,
          firmware_version: opts.firmware,
          network_address:  opts.address,
          criticality:      criticality(opts.criticality),
        })
        ok(`Registered ${$.bold(component.name)} (${component.component_id})`)
      }))

  // ─── Telemetry ──────────────────────────────────────────────────────────────

  program
    .command('replay <file>')
    .description('Ingest recorded telemetry from a JSON file')
    .action((file: string) => run(async (platform) => {
      const parsed = ReplayFileSchema.safeParse(readJson(file))
      if (!parsed.success) {
        fail(`Replay file is invalid: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
        return
      }

      for (const c of parsed.data.components) {
        if (await platform.stores.components.findByName(c.name)) continue
        await platform.registry.register(c)
      }

      const s = spinner(`Replaying ${parsed.data.readings.length} reading(s)…`)
      let invalid = 0
      let event_count = 0
      for (const reading of parsed.data.readings) {
        const result = await platform.ingestReading({
          component: reading.component,
          payload:   reading.payload,
          timestamp: reading.timestamp,
          actor:     settings.operator,
        })
        if (result.invalid_reason) invalid++
        event_count += result.event_ids.length
      }
      s.stop()

      const events = await platform.sink.listEvents({ limit: 200 })
      if (events.length > 0) table(eventRows([...events].reverse()))
      io.out()
      ok(`${parsed.data.readings.length} reading(s), ${invalid} invalid, ${event_count} event(s)`)
    }))

  // ─── Attack drills ──────────────────────────────────────────────────────────

  program
    .command('scenarios')
    .description('List attack drills')
    .action(() => run(async (platform) => {
      table([
        ['Tag', 'Description', 'Mitigation'],
        ...platform.simulator.listScenarios().map(s => [$.bold(s.tag), s.description, s.mitigation]),
      ])
    }))

  program
    .command('simulate <attack>')
    .description('Run an attack drill through the live detectors')
    .requiredOption('--component <name>', 'Target component')
    .action((attack: string, opts: { component: string }) => run(async (platform) => {
      const interrupt = untilInterrupted()
      const s = spinner(`Running ${attack} against ${opts.component}…`)
      try {
        const result = await platform.simulateAttack({
          attack_type: attack,
          component:   opts.component,
          actor:       settings.operator,
          signal:      interrupt.signal,
          onStep:      (step, total) => { s.text = `Running ${attack} against ${opts.component} (${step}/${total})…` },
        })
        s.stop()

        if (result.events.length > 0) table(eventRows(result.events))
        io.out()
        if (result.truncated) warn(`Interrupted after ${result.steps_run}/${result.steps_total} step(s)`)
        ok(`${result.scenario} on ${result.component}: ${result.events.length} event(s) in ${result.steps_run} step(s)`)
      } catch (err) {
        s.stop()
        throw err
      } finally {
        interrupt.release()
      }
    }))

  // ─── Keys & signing ─────────────────────────────────────────────────────────

  program
    .command('keygen')
    .description('Create an Ed25519 signing key pair')
    .option('--key-id <id>', 'Key identifier', 'vendor-1')
    .option('--out <dir>', 'Write <id>.pem, <id>.pub.pem and keyring.json here')
    .action((opts: { keyId: string; out?: string }) => {
      const pair = generateSigningKeyPair()
      if (!opts.out) {
        io.out(pair.privateKey.trimEnd())
        io.out(pair.publicKey.trimEnd())
        return
      }
      mkdirSync(opts.out, { recursive: true })
      writeFileSync(join(opts.out, `${opts.keyId}.pem`), pair.privateKey, { mode: 0o600 })
      writeFileSync(join(opts.out, `${opts.keyId}.pub.pem`), pair.publicKey)
      writeFileSync(join(opts.out, 'keyring.json'), JSON.stringify({ [opts.keyId]: pair.publicKey }, null, 2))
      ok(`Key ${$.bold(opts.keyId)} written to ${opts.out}`)
    })

  program
    .command('sign <image>')
    .description('Sign a firmware image for one component and version')
    .requiredOption('--component <name>', 'Target component')
    .requiredOption('--target <version>', 'Target firmware version')
    .requiredOption('--key <file>', 'Private key (PEM)')
    .option('--key-id <id>', 'Key identifier', 'vendor-1')
    .option('--out <file>', 'Write the signed envelope here instead of stdout')
    .action((image: string, opts: { component: string; target: string; key: string; keyId: string; out?: string }) => {
      try {
        const envelope = signPatchPayload(
          readFileSync(image),
          { component: opts.component, target_version: opts.target },
          readFileSync(opts.key, 'utf8'),
          opts.keyId
        )
        const json = JSON.stringify(envelope, null, 2)
        if (opts.out) {
          writeFileSync(opts.out, json)
          ok(`Signed envelope written to ${opts.out}`)
        } else {
          io.out(json)
        }
      } catch (err) {
        fail(`Could not sign ${image}: ${err instanceof Error ? err.message : String(err)}`)
      }
    })

  // ─── Patch rollout ──────────────────────────────────────────────────────────

  program
    .command('patch <component> <version>')
    .description('Roll out a signed firmware image')
    .requiredOption('--payload <file>', 'Signed envelope (from: gridwarden sign)')
    .option('--notes <text>', 'Free-form notes kept on the rollout')
    .option('--keys <file>', 'Trusted keyring JSON (overrides the configured one)')
    .action((component: string, version: string, opts: { payload: string; notes?: string; keys?: string }) =>
      run(async (platform) => {
        const s = spinner(`Rolling out ${version} to ${component}…`)
        const final = await platform.rollout({
          component,
          target_version: version,
          signed_payload: readJson(opts.payload),
          requested_by:   settings.operator,
          notes:          opts.notes,
        })
        s.stop()

        table(historyRows(final))
        io.out()
        if (final.status === 'succeeded') {
          ok(`${component} now runs ${$.bold(version)} (rollout ${final.patch_id})`)
        } else {
          fail(`Rollout ${final.patch_id} ended ${fmtPatchState(final.status)}`)
        }
      }, { keys_file: opts.keys }))

  // ─── Events & summary ───────────────────────────────────────────────────────

  program
    .command('events')
    .description('List security events, newest first')
    .option('--severity <level>', 'info, warning or critical', severity)
    .option('--category <category>', 'e.g. rule-violation, deviation')
    .option('--limit <n>', 'At most this many (max 200)', positiveInt, 100)
    .option('--ticks <n>', 'Play this many demo feed ticks first', nonNegativeInt, 0)
    .action((opts: { severity?: EventSeverity; category?: string; limit: number; ticks: number }) =>
      run(async (platform) => {
        await runTicks(platform, opts.ticks)
        const events = await platform.sink.listEvents({
          severity: opts.severity,
          category: opts.category,
          limit:    opts.limit,
        })
        if (events.length === 0) { warn('No security events'); return }
        table(eventRows(events))
      }))

  program
    .command('summary')
    .description('Counts plus the five latest events')
    .option('--ticks <n>', 'Play this many demo feed ticks first', nonNegativeInt, 0)
    .action((opts: { ticks: number }) => run(async (platform) => {
      await runTicks(platform, opts.ticks)
      const summary = await platform.getActivitySummary()
      io.out($.bold.cyan('  Activity'))
      io.out($.cyan('  ─────────────────────────────'))
      io.out(`  Components  ${summary.components}`)
      io.out(`  Readings    ${summary.readings}`)
      io.out(`  Events      ${summary.events}`)
      io.out(`  Rollouts    ${summary.rollouts}`)
      io.out()
      if (summary.recent_events.length > 0) table(eventRows(summary.recent_events))
    }))

  program
    .command('feed')
    .description('Play the demo microgrid through the detectors')
    .option('--ticks <n>', 'Number of ticks to play', positiveInt, 1)
    .option('--watch', 'Keep polling until Ctrl-C')
    .action((opts: { ticks: number; watch?: boolean }) => run(async (platform) => {
      if (!opts.watch) {
        for (let i = 1; i <= opts.ticks; i++) {
          const tick = await platform.feed.nudge()
          io.out(`tick ${i}: ${tick.readings} reading(s), ${tick.events} event(s)`)
        }
        return
      }

      const interrupt = untilInterrupted()
      platform.feed.start()
      ok(`Feed running every ${platform.config.feed.interval_ms / 1000}s. Ctrl-C to stop.`)
      await new Promise<void>(resolve => {
        if (interrupt.signal.aborted) resolve()
        interrupt.signal.addEventListener('abort', () => resolve(), { once: true })
      })
      interrupt.release()
      platform.feed.stop()
      ok(`Stopped after ${platform.feed.getState().ticks} tick(s)`)
    }))

  // ─── Config ─────────────────────────────────────────────────────────────────

  const configCmd = program.command('config').description('Operator settings')

  configCmd
    .command('set-operator <name>')
    .description('Name recorded as actor on drills, replays and rollouts')
    .action((name: string) => {
      try {
        settings.setOperator(name)
        ok(`Operator set to ${$.bold(settings.operator)}`)
      } catch (err) {
        fail(err instanceof Error ? err.message : String(err))
      }
    })

  configCmd
    .command('set-keys <file>')
    .description('Trusted keyring JSON used by patch')
    .action((file: string) => {
      settings.setKeysFile(file)
      ok(`Keyring set to ${file}`)
    })

  configCmd
    .command('show')
    .description('Print the current settings')
    .action(() => {
      io.out(`operator   ${settings.operator}`)
      io.out(`keys_file  ${settings.keysFile ?? '-'}`)
      io.out(`stored in  ${settings.path}`)
    })

  return program
}
