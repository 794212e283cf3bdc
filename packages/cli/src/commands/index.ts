/**
 * commands/index.ts - Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/stepwise.ts   (executable entry point)
 */

import { program } from 'commander'
import { inspectCommand } from './inspect.js'

program
  .name('stepwise')
  .description(
    'Stepwise - installer module system.\n' +
    'Builds modules from their module.desc descriptors and layered configuration files.',
  )
  .version('0.1.0')

program.addCommand(inspectCommand)

export { program }
