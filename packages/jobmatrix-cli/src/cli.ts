#!/usr/bin/env node

import { getCliHelpText, parseCliOptions } from './cliOptions.js'
import { reportCliError } from './reportCliError.js'
import { runCliPipeline } from './runPipeline.js'

const main = async (argv: readonly string[]): Promise<void> => {
  const options = parseCliOptions(argv, process.cwd())

  if (options.help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    return
  }

  process.exitCode = await runCliPipeline(options)
}

void main(process.argv.slice(2)).catch(reportCliError)
