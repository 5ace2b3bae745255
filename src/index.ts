#!/usr/bin/env node
import { CONFIG } from './config.js';
import { main } from './cli.js';

process.exitCode = main(process.argv.slice(2), CONFIG);
