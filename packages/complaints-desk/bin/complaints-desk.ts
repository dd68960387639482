#!/usr/bin/env node
/**
 * Complaints Desk CLI Entry Point
 *
 * Interactive reporting over the municipal complaints datasets.
 *
 * @module complaints-desk-cli
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { ReadlinePrompter } from '../src/cli/lib/prompt.js';
import { EXIT_CODES, runSession } from '../src/cli/session.js';
import { errorMessage, isConfigError } from '../src/core/types/errors.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  // bin/ from sources, dist/bin/ once built
  for (const packageJsonPath of [
    join(__dirname, '..', 'package.json'),
    join(__dirname, '..', '..', 'package.json'),
  ]) {
    if (!existsSync(packageJsonPath)) continue;
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  }
  return '0.0.0';
}

interface GlobalOptions {
  verbose?: boolean;
  config?: string;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('complaints-desk')
    .description('Interactive reports over municipal complaints, residents and status history')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--config <path>', 'Path to config file (default: .complaints-deskrc)')
    .action(async (options: GlobalOptions) => {
      let config: CLIConfig;
      try {
        config = await loadConfig({
          configPath: options.config,
          overrides: { verbose: options.verbose },
        });
      } catch (error) {
        console.error(
          isConfigError(error) ? error.toLogString() : `Configuration error: ${errorMessage(error)}`
        );
        process.exitCode = EXIT_CODES.CONFIG_ERROR;
        return;
      }

      const logger = createCLILogger({
        level: config.verbose ? 'debug' : 'info',
        json: config.logging.json,
      });
      logger.debug('Configuration loaded', {
        source: config.configPath ?? 'defaults',
        database: config.paths.database,
      });

      process.exitCode = await runSession({
        config,
        logger,
        prompter: new ReadlinePrompter(),
      });
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
