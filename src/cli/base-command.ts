/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error handling and exit codes
 * - Output utilities (log, warn, error)
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { ConfigurationError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Dataset file used instead of the built-in countries */
  dataset?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Resource not found (country, scenario) */
  NOT_FOUND: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers should receive a BaseCommand instance
 * to access consistent logging, error handling, and options.
 *
 * @example
 * ```typescript
 * async function recommendHandler(options: RecommendCommandOptions, cmd: Command) {
 *   const base = getBaseCommand(cmd);
 *
 *   try {
 *     const advisor = await createAdvisor(base);
 *     base.info(`Ranking ${advisor.countries.length} countries`);
 *   } catch (err) {
 *     reportError(base, err);
 *   }
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   */
  constructor(options: GlobalOptions) {
    this.options = options;

    // Configure chalk based on color preference
    if (options.color === false || process.stdout.isTTY !== true) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param message - Error message
   * @param code - Exit code (defaults to EXIT_CODES.ERROR)
   */
  error(message: string, code: ExitCode = EXIT_CODES.ERROR): void {
    console.error(chalk.red(`Error: ${message}`));
    process.exit(code);
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print a section header underlined to its own width.
   */
  section(title: string): void {
    if (!this.options.quiet) {
      console.log();
      console.log(chalk.bold(title));
      console.log(chalk.dim('='.repeat(title.length)));
    }
  }

  /**
   * Print data as formatted JSON (shown even in quiet mode).
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a key-value pair.
   */
  keyValue(key: string, value: string | number): void {
    if (!this.options.quiet) {
      console.log(`${chalk.dim(key + ':')} ${value}`);
    }
  }

  /**
   * Check if verbose mode is enabled.
   */
  isVerbose(): boolean {
    return this.options.verbose === true;
  }
}

// ============================================================================
// Lookup and Error Reporting
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Walks up to the root program, where the preAction hook stores it.
 *
 * @param cmd - Commander command instance (any depth)
 * @returns BaseCommand, or a default one when not available (for testing)
 */
export function getBaseCommand(cmd: Command): BaseCommand {
  let root = cmd;
  while (root.parent) {
    root = root.parent;
  }
  const base: unknown = root.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}

/**
 * Exit code matching an error raised by a command handler.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  return EXIT_CODES.ERROR;
}

/**
 * Report an error from a command handler and exit with its code.
 */
export function reportError(base: BaseCommand, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  base.error(message, exitCodeFor(error));
}
