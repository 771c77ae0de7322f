/**
 * cache-lab CLI
 *
 * Replays a memory trace against a simulated cache, once without and once
 * with next-block prefetching, and prints both sets of statistics.
 *
 *   cache-lab <cache_size> <associativity> <policy> <block_size> <trace_file>
 *
 * Associativity: direct | assoc | assoc:N
 * Policy:        fifo | lru
 */

import { Command, CommanderError, Option } from 'commander'
import { ExitCode, describeConfig, isSimulatorError, parseCacheConfig } from '../../core/src'
import { createLogger } from './logger'
import { REPORT_FORMATS, formatReport, type ReportFormat } from './report'
import { simulateTraceFile } from './traceReader'

const pkg = {
  name: 'cache-lab',
  version: '0.1.0',
  description: 'Replay a memory trace against a simulated cache with and without prefetching',
}

interface SimulateOptions {
  format: ReportFormat
  verbose?: boolean
  quiet?: boolean
  color: boolean
}

export function createProgram(onExitCode: (code: number) => void): Command {
  return new Command()
    .name(pkg.name)
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'Show version number')
    .argument('<cache_size>', 'total cache size in bytes (power of 2)')
    .argument('<associativity>', 'direct | assoc | assoc:N')
    .argument('<policy>', 'replacement policy: fifo | lru')
    .argument('<block_size>', 'block size in bytes (power of 2)')
    .argument('<trace_file>', 'trace file with "<pc>: <R|W> <address>" lines')
    .addOption(new Option('-f, --format <format>', 'report format').choices(REPORT_FORMATS).default('text'))
    .option('--verbose', 'log skipped trace lines and run details')
    .option('-q, --quiet', 'only print the report and errors')
    .option('--no-color', 'disable colored diagnostics')
    .action(async (
      cacheSize: string,
      associativity: string,
      policy: string,
      blockSize: string,
      traceFile: string,
      options: SimulateOptions
    ) => {
      const logger = createLogger('', {
        level: options.verbose ? 'debug' : 'info',
        silent: options.quiet,
        colors: options.color ? undefined : false,
      })

      try {
        const config = parseCacheConfig({ cacheSize, associativity, policy, blockSize })
        logger.debug(`Simulating ${describeConfig(config)}`, { trace: traceFile })

        const report = await simulateTraceFile(traceFile, config, logger)
        if (report.skipped > 0) {
          logger.info(`Skipped ${report.skipped} malformed trace line${report.skipped === 1 ? '' : 's'}`)
        }
        logger.log(formatReport(report, options.format))
        onExitCode(ExitCode.SUCCESS)
      } catch (error) {
        if (!isSimulatorError(error)) throw error
        logger.error(`Error: ${error.message}`)
        onExitCode(error.exitCode)
      }
    })
}

/**
 * Run the CLI against `argv` (node-style, including the executable and
 * script path) and resolve with the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  let exitCode: number = ExitCode.SUCCESS
  const program = createProgram(code => {
    exitCode = code
  }).exitOverride()

  try {
    await program.parseAsync(argv)
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode
    throw error
  }
  return exitCode
}
