#!/usr/bin/env node
/**
 * @entry paper-check CLI 主入口
 *
 *   pcheck orig.txt orig_add.txt ans.txt
 */

import { runCli } from './runCli.js'
import { printError } from '../shared/error.js'

try {
  process.exitCode = await runCli(process.argv)
} catch (err) {
  printError(err)
  process.exitCode = 1
}
