#!/usr/bin/env node
/**
 * CLI entry point for switchyard.
 * Handles argument parsing, --init, environment variable setup,
 * and delegates to the main application bootstrap.
 */

import { parseArgs } from 'node:util';
import { initConfig } from './config/init.js';
import { ConfigError } from './shared/errors.js';

const { values } = parseArgs({
  options: {
    config: {
      type: 'string',
      short: 'c',
    },
    port: {
      type: 'string',
      short: 'p',
    },
    init: {
      type: 'boolean',
    },
    help: {
      type: 'boolean',
      short: 'h',
    },
  },
  strict: false,
});

if (values.help) {
  console.log(`
switchyard - OpenAI-compatible router that picks the best available backend

Usage:
  switchyard [options]

Options:
  -c, --config <path>   Path to config file (default: ./config/config.yaml)
  -p, --port <port>     Port to listen on (overrides config)
  --init                Initialize config file in current directory
  -h, --help            Show this help message
`);
  process.exit(0);
}

if (values.init) {
  try {
    const targetPath = initConfig(process.cwd());
    console.log(`Created config file: ${targetPath}`);
    console.log('');
    console.log('Next steps:');
    console.log('  1. Edit the config file with your API keys and backends');
    console.log('  2. Run: switchyard');
    process.exit(0);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

if (typeof values.config === 'string') {
  process.env['CONFIG_PATH'] = values.config;
}
if (typeof values.port === 'string') {
  process.env['PORT'] = values.port;
}

await import('./index.js');
