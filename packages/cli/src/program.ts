import { Command } from 'commander'
import { registerDeployCommand } from './commands/deploy'
import { registerPlanCommand } from './commands/plan'
import { registerContentTypeCommand } from './commands/content-type'
import { isColorMode, logger, setColorMode } from './utils/logger'

const VERSION: string = '0.1.0'

type GlobalOptions = {
  readonly verbose?: boolean
  readonly quiet?: boolean
  readonly json?: boolean
  readonly ndjson?: boolean
  readonly timestamps?: boolean
  readonly emoji?: boolean
  readonly color?: string
}

export function applyGlobalOptions(o: GlobalOptions): void {
  if (o.verbose === true) logger.setLevel('debug')
  if (o.quiet === true) logger.setLevel('error')
  if (o.emoji === false) logger.setNoEmoji(true)
  if (o.timestamps === true) logger.setTimestamps(true)
  if (o.ndjson === true) logger.setNdjson(true)
  else if (o.json === true) logger.setJsonOnly(true)
  if (o.color !== undefined) {
    if (!isColorMode(o.color)) throw new Error(`--color must be auto, always or never (got "${o.color}")`)
    setColorMode(o.color)
  }
}

export function createProgram(): Command {
  const program: Command = new Command()
  program.name('staticdeploy')
  program.description('Build a static site and publish it to storage static website hosting')
  program.version(VERSION, '-v, --version', 'output the version number')
  program.option('--verbose', 'Verbose output')
  program.option('--quiet', 'Error-only output (suppresses info/warn/success)')
  program.option('--json', 'JSON-only output (suppresses non-JSON logs)')
  program.option('--ndjson', 'Newline-delimited JSON streaming (implies --json)')
  program.option('--timestamps', 'Prefix human logs and JSON with ISO timestamps')
  program.option('--no-emoji', 'Disable emoji prefixes for logs')
  program.option('--color <mode>', 'Color mode: auto|always|never', 'auto')
  program.hook('preAction', (thisCommand: Command): void => {
    applyGlobalOptions(thisCommand.opts<GlobalOptions>())
  })
  registerDeployCommand(program)
  registerPlanCommand(program)
  registerContentTypeCommand(program)
  return program
}
