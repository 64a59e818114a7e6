import { Command } from 'commander'
import { DEFAULT_CONFIG_FILE } from './config-loader'

/**
 * Parsed command-line arguments
 */
export interface CliArgs {
  /** Path to the configuration file */
  config: string

  /** Output directory, overrides charts.directory */
  directory?: string

  /** Broker endpoint, overrides transport.endpoint */
  endpoint?: string

  /** Routing identity, overrides transport.identity */
  identity?: string

  /** False when --no-notify was given */
  notify: boolean

  /** Render this request file once and exit instead of serving */
  render?: string

  /** Verbosity level for logging */
  verbose: number
}

/**
 * Default CLI arguments
 */
export const DEFAULT_ARGS: Pick<CliArgs, 'config' | 'notify' | 'verbose'> = {
  config: DEFAULT_CONFIG_FILE,
  notify: true,
  verbose: 0
}

function buildProgram(): Command {
  const program = new Command()

  program
    .name('chart-renderer')
    .description('Renders candlestick chart requests from the message bus into PNG files')
    .version('1.0.0')
    .usage('[options]')
    .exitOverride()

  program
    .option('-c, --config <file>', 'path to service configuration file', DEFAULT_ARGS.config)
    .option('-d, --directory <dir>', 'output directory for rendered charts')
    .option('-e, --endpoint <endpoint>', 'message bus endpoint, e.g. tcp://127.0.0.1:6565')
    .option('-i, --identity <identity>', 'routing identity of this service')
    .option('--no-notify', 'do not send notifications after rendering')
    .option('-r, --render <file>', 'render a request JSON file once and exit')
    .option(
      '-v, --verbose',
      'increase verbosity (can be used multiple times: -v, -vv)',
      (_, previous: number) => previous + 1,
      DEFAULT_ARGS.verbose
    )

  program.addHelpText('after', `

Examples:
  $ chart-renderer                                 # Serve with ./chart-renderer.json
  $ chart-renderer -c /etc/charts.json             # Use a custom config file
  $ chart-renderer -d ./charts -e tcp://host:6565  # Override directory and endpoint
  $ chart-renderer -r request.json -d ./charts     # Render one request file
  $ chart-renderer -vv                             # Debug logging
`)

  return program
}

/**
 * Parse command-line arguments using commander
 * @throws CommanderError on unknown options, --help and --version
 */
export function parseArgs(argv: string[]): CliArgs {
  const program = buildProgram()
  program.parse(argv)
  const options = program.opts<{
    config: string
    directory?: string
    endpoint?: string
    identity?: string
    notify: boolean
    render?: string
    verbose: number
  }>()

  return {
    config: options.config,
    directory: options.directory,
    endpoint: options.endpoint,
    identity: options.identity,
    notify: options.notify,
    render: options.render,
    verbose: options.verbose
  }
}

/**
 * Maps -v / -vv to a winston level
 */
export function logLevelFor(verbose: number): string | undefined {
  if (verbose >= 2) return 'debug'
  if (verbose === 1) return 'verbose'
  return undefined
}
