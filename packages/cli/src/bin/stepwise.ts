#!/usr/bin/env node
/**
 * bin/stepwise.ts - entry point for the `stepwise` CLI command.
 */

import { program } from '../commands/index.js'

program.parse()
