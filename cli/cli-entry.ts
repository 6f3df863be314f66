#!/usr/bin/env node
/**
 * Main entry point for the solconf command line.
 */
import { main } from './index';

process.exitCode = main(process.argv.slice(2));
