#!/usr/bin/env node
/**
 * Relocation Advisor CLI
 *
 * Main entry point for the relocate CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   relocate --help
 *   relocate recommend --scenario digital-nomad
 *   relocate recommend -w safety_index=0.6 -w healthcare_index=0.4 -m internet_speed=100 -n 3
 *   relocate score Portugal --scenario family
 *
 * @module cli
 */

import { Command } from 'commander';
import { BaseCommand, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

/**
 * Current CLI version.
 * Should match package.json version.
 */
export const VERSION = '1.0.0';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * @returns Configured commander Program instance
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('relocate')
    .description('Relocation Advisor - Rank countries against your own weighted criteria')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--dataset <path>', 'Load countries from a JSON file instead of the built-in list');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags');
    }
  });

  // Register all subcommands
  registerCommands(program);

  // Global error handling
  program.exitOverride((err) => {
    if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
      process.exit(0);
    }
    process.exit(err.exitCode === 0 ? 0 : 2);
  });

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    // Error already handled by commander or base command
    if (error instanceof Error && error.message) {
      console.error(`Error: ${error.message}`);
    }
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
