#!/usr/bin/env node
/**
 * GridWarden Operator CLI
 *
 * Entry point: loads .env, builds the platform per command and maps
 * commander's own exits (help, version, usage errors) to exit codes.
 */

import 'dotenv/config'
import { CommanderError } from 'commander'
import chalk from 'chalk'
import { createPlatform, loadConfig } from '@gridwarden/platform-core'
import { createOperatorConfig } from './config'
import { buildProgram, consoleIO } from './program'

const settings = createOperatorConfig()

const program = buildProgram({
  io: consoleIO,
  settings,
  createPlatform: (keys_file) => createPlatform({
    config: loadConfig({
      ...process.env,
      // --keys, then `config set-keys`, then the environment
      GRIDWARDEN_PATCH_KEYS_FILE: keys_file ?? process.env.GRIDWARDEN_PATCH_KEYS_FILE,
    }),
  }),
})

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode
    return
  }
  console.error(chalk.red('✗'), err instanceof Error ? err.message : err)
  process.exitCode = 1
})
