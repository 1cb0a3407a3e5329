#!/usr/bin/env node
/**
 * CLI entrypoint for sclang-lsp-stdio.
 *
 * Usage:
 *   sclang-lsp-stdio [options] [-- <extra sclang args...>]
 *
 * The editor's LSP traffic arrives on stdin and leaves on stdout as
 * `Content-Length` framed messages. sclang speaks the same messages over UDP;
 * this process relays between the two once sclang reports it is ready.
 * Diagnostics go to the log file (or, for errors only, to stderr).
 *
 * Exit codes:
 * - sclang's own exit code when it ran
 * - 1: unexpected error
 * - 2: invalid arguments or configuration
 *
 * @module
 */
import { CommanderError } from 'commander'
import { type CliOptions, parseCliArgs } from '../cli-args.js'
import { PortConfigError, type RelayPorts, resolvePorts } from '../config.js'
import { StdoutSink } from '../io/sink.js'
import { createRootLogger, errorMessage } from '../logger.js'
import { ExecutableNotFoundError, Supervisor } from '../supervisor.js'

/**
 * Write an error message to stderr and exit with code 2 (invalid input).
 */
function fatalError(message: string): never {
  process.stderr.write(`Error: ${message}\n`)
  process.exit(2)
}

async function main(): Promise<never> {
  let cli: CliOptions
  try {
    cli = parseCliArgs(process.argv.slice(2))
  } catch (err) {
    if (err instanceof CommanderError) {
      // commander has already printed the message or help text
      process.exit(err.exitCode === 0 ? 0 : 2)
    }
    throw err
  }

  const logger = createRootLogger('lsp_runner', cli)

  let ports: RelayPorts
  try {
    ports = await resolvePorts(cli)
  } catch (err) {
    if (err instanceof PortConfigError) {
      fatalError(err.message)
    }
    throw err
  }
  logger.info(`Using ports (receive: ${ports.receivePort}), (send: ${ports.sendPort})`)

  const sink = new StdoutSink(process.stdout)
  const supervisor = new Supervisor({
    logger,
    executable: cli.sclangPath,
    ideName: cli.ideName,
    ports,
    serverLogLevel: cli.verbose ? 'debug' : 'warning',
    sink,
    input: process.stdin
  })

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received termination signal ${signal}`)
    supervisor.stop().catch((err: unknown) => {
      logger.error(`Error while stopping: ${errorMessage(err)}`)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  let exitCode: number
  try {
    exitCode = await supervisor.start(cli.extraArgs)
  } catch (err) {
    if (err instanceof ExecutableNotFoundError) {
      logger.error(err.message)
      await logger.close()
      fatalError(err.message)
    }
    throw err
  }

  // Messages completed just before the child exited may still be queued;
  // the editor must see them (e.g. the reply to `shutdown`) before EOF.
  await sink.close().catch((err: unknown) => {
    logger.warn(`Could not flush stdout: ${errorMessage(err)}`)
  })
  await logger.close()
  process.exit(exitCode)
}

main().catch((err) => {
  process.stderr.write(`Unexpected error: ${errorMessage(err)}\n`)
  process.exit(1)
})
