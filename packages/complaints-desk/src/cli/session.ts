/**
 * Interactive session
 *
 * Opens the store, loads the datasets once, then runs the menu loop until
 * the user exits, interrupts, or an unhandled error ends it. The store and
 * the prompter are released on every one of those paths.
 *
 * @module cli/session
 */

import { openStore, type SqliteStore } from '../persistence/sqlite-store.js';
import { ingestDatasets } from '../ingestion/ingest.js';
import {
  errorMessage,
  isConnectionError,
  isInvalidParameterError,
  isUserInterruptError,
} from '../core/types/errors.js';
import { datasetSources, type CLIConfig } from './lib/config.js';
import { parseMenuChoice } from './lib/input.js';
import { createSilentLogger, formatDuration, type CLILogger } from './lib/logger.js';
import type { Writer } from './lib/output.js';
import type { Prompter } from './lib/prompt.js';
import {
  MENU_ENTRIES,
  findMenuEntry,
  renderMenu,
  type MenuContext,
  type MenuEntry,
} from './menu.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  STORE_ERROR: 4,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Session
// ============================================================================

export interface SessionOptions {
  readonly config: CLIConfig;
  readonly prompter: Prompter;
  readonly write?: Writer;
  readonly logger?: CLILogger;
  /** Clock for age-based reports (default: wall clock) */
  readonly now?: () => Date;
  readonly entries?: readonly MenuEntry[];
}

/**
 * Run one menu entry; a rejected parameter is reported and ends only this
 * entry
 */
async function runEntry(entry: MenuEntry, context: MenuContext, logger: CLILogger): Promise<void> {
  const started = Date.now();
  logger.commandStart(`report-${entry.key}`);

  try {
    await entry.run(context);
  } catch (error) {
    if (isInvalidParameterError(error)) {
      context.write(error.message);
      logger.debug('Rejected report parameter', {
        parameter: error.parameter,
        input: error.input,
      });
      return;
    }
    if (!isUserInterruptError(error)) {
      logger.commandEnd(false, { error: errorMessage(error) });
    }
    throw error;
  }

  logger.commandEnd(true, { elapsed: formatDuration(Date.now() - started) });
}

/**
 * Run the interactive session to completion.
 *
 * @returns Process exit code
 */
export async function runSession(options: SessionOptions): Promise<ExitCode> {
  const { config, prompter } = options;
  const write = options.write ?? ((text: string) => console.log(text));
  const logger = options.logger ?? createSilentLogger();
  const entries = options.entries ?? MENU_ENTRIES;
  const maxChoice = entries.reduce((max, entry) => Math.max(max, entry.key), 0);

  let store: SqliteStore | null = null;

  write('Welcome to the Municipal Complaints Database CLI!');

  try {
    write('Initializing database...');
    store = openStore(config.paths.database, { logger });
    ingestDatasets(store, datasetSources(config), { logger });
    write('Database initialized successfully!');

    const context: MenuContext = {
      store,
      prompter,
      write,
      now: options.now ?? (() => new Date()),
      reports: config.reports,
    };

    for (;;) {
      write(renderMenu(entries, config.reports));
      const choice = parseMenuChoice(await prompter.ask(`\nEnter your choice (0-${maxChoice}): `));

      if (choice === 0) {
        write('Goodbye!');
        return EXIT_CODES.SUCCESS;
      }

      const entry = choice === null ? undefined : findMenuEntry(choice, entries);
      if (entry) {
        await runEntry(entry, context, logger);
      } else {
        write(`Invalid choice. Please enter a number between 0-${maxChoice}.`);
      }

      await prompter.ask('\nPress Enter to continue...');
    }
  } catch (error) {
    if (isUserInterruptError(error)) {
      write('\n\nExiting...');
      return EXIT_CODES.USER_CANCELLED;
    }

    logger.error('Session failed', { error: errorMessage(error) });
    write(`An error occurred: ${errorMessage(error)}`);
    return isConnectionError(error) ? EXIT_CODES.STORE_ERROR : EXIT_CODES.ERRORS;
  } finally {
    store?.disconnect();
    prompter.close();
  }
}
