import { createProgram } from './program'
import { logger } from './utils/logger'

function main(): void {
  createProgram().parseAsync(process.argv).catch((err: unknown) => {
    logger.error(err instanceof Error ? err.message : String(err))
    process.exitCode = 1
  })
}

main()
