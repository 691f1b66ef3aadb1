#!/usr/bin/env node
/**
 * Set Cover CLI - standalone entry point
 *
 * Usage:
 *   setcover solve data/test-4.txt --check
 *   setcover help
 */

import { EXIT_FAILURE, runCli } from './CliCommands';

runCli(process.argv.slice(2), { stdout: text => process.stdout.write(text) })
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        console.error('❌ CLI error:', error);
        process.exitCode = EXIT_FAILURE;
    });
