#!/usr/bin/env node
/**
 * @fileoverview CLI entry point. Loads `.env` and hands the arguments to
 * the scanner.
 */

import 'dotenv/config'
import { runCli } from './src/cli.js'

process.exitCode = await runCli(process.argv.slice(2))
