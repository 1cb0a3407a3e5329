/**
 * Command-line parsing for the sclang-lsp-stdio entrypoint.
 *
 * Kept apart from the entrypoint so it can be tested without triggering
 * main() side effects.
 *
 * @module
 */
import { Command, InvalidArgumentError, Option } from 'commander'
import { DEFAULT_IDE_NAME, defaultSclangPath } from './config.js'

export interface CliOptions {
  readonly sclangPath: string
  /** Port the child sends to, as named on the command line */
  readonly sendPort?: number
  /** Port the child listens on, as named on the command line */
  readonly receivePort?: number
  readonly ideName: string
  readonly verbose: boolean
  readonly logFile?: string
  /** Passed through verbatim to sclang */
  readonly extraArgs: readonly string[]
}

type RawOptions = {
  sclangPath?: string
  sendPort?: number
  receivePort?: number
  ideName: string
  verbose?: boolean
  logFile?: string
}

function parsePort(value: string): number {
  const port = Number(value)
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('must be an integer between 1 and 65535')
  }
  return port
}

const EPILOG = `
example with extra sclang args (custom langPort and libraryConfig):
  sclang-lsp-stdio --sclang-path /path/to/sclang -v --log-file /path/to/logfile -- -u 57300 -l custom_sclang_conf.yaml
`

/**
 * Build the commander program. The sclang path is mandatory only where the
 * platform has no default.
 */
export function createProgram(platform: NodeJS.Platform = process.platform): Command {
  const sclangDefault = defaultSclangPath(platform)
  const sclangPath = new Option('--sclang-path <path>', 'path to the sclang executable')
  if (sclangDefault === undefined) {
    sclangPath.makeOptionMandatory()
  } else {
    sclangPath.default(sclangDefault)
  }

  return new Command('sclang-lsp-stdio')
    .description('Runs the SuperCollider LSP server and provides stdin/stdout access to it')
    .addOption(sclangPath)
    .option('--send-port <port>', 'UDP port sclang sends to', parsePort)
    .option('--receive-port <port>', 'UDP port sclang listens on', parsePort)
    .option('--ide-name <name>', 'IDE name passed to sclang', DEFAULT_IDE_NAME)
    .option('-v, --verbose', 'verbose logging (requires --log-file)')
    .option('-l, --log-file <path>', 'write logs to this file')
    .argument('[extraSclangArgs...]', 'cli arguments for sclang (see example below)')
    .addHelpText('after', EPILOG)
}

export interface ParseCliOptions {
  readonly platform?: NodeJS.Platform
  /** Sink for commander's error and help output (default: stderr/stdout) */
  readonly writeErr?: (text: string) => void
  readonly writeOut?: (text: string) => void
}

/**
 * Parse user arguments (argv without the node binary and script path).
 *
 * @throws CommanderError on invalid arguments, --help or --version
 */
export function parseCliArgs(argv: readonly string[], options: ParseCliOptions = {}): CliOptions {
  const program = createProgram(options.platform).exitOverride()
  if (options.writeErr || options.writeOut) {
    program.configureOutput({
      ...(options.writeErr && { writeErr: options.writeErr }),
      ...(options.writeOut && { writeOut: options.writeOut })
    })
  }
  program.parse([...argv], { from: 'user' })

  const raw = program.opts<RawOptions>()
  if (raw.sclangPath === undefined) {
    // Unreachable: the option is mandatory or defaulted
    throw new Error('--sclang-path is required on this platform')
  }

  return {
    sclangPath: raw.sclangPath,
    ...(raw.sendPort !== undefined && { sendPort: raw.sendPort }),
    ...(raw.receivePort !== undefined && { receivePort: raw.receivePort }),
    ideName: raw.ideName,
    verbose: raw.verbose === true,
    ...(raw.logFile !== undefined && { logFile: raw.logFile }),
    extraArgs: [...program.args]
  }
}
