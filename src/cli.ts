#!/usr/bin/env node

import { runCli } from './cli/Run.js';

process.exitCode = runCli(process.argv.slice(2));
