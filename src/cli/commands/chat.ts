/**
 * Chat command handler for the blueprint CLI.
 *
 * Loads settings, wires a session and runs the interactive chat.
 */

import { loadSettings, type LoadSettingsOptions } from '../../config/loader.js';
import type { RuntimeSettings } from '../../config/types.js';
import { AccessGate } from '../../session/access.js';
import { createBlueprintSession } from '../../session/factory.js';
import { Logger } from '../../utils/logger.js';
import { ChatCli } from '../chat.js';
import { formatErrorWithSuggestions } from '../errors.js';
import type { DisplayOptions } from '../format.js';
import {
  createReadlineReader,
  defaultOutputWriter,
  type InputReader,
  type OutputWriter,
} from '../io.js';
import type { CliCommandResult } from '../types.js';

/**
 * Dependencies of the chat command, replaceable in tests.
 */
export interface ChatCommandOptions {
  readonly display: DisplayOptions;
  readonly settings?: LoadSettingsOptions;
  readonly reader?: InputReader;
  readonly writer?: OutputWriter;
  readonly fetch?: typeof fetch;
  /** Sink for log lines. Defaults to stderr. */
  readonly writeLog?: (line: string) => void;
}

/**
 * Creates the logger for a chat run. Info entries are hidden unless debug
 * logging is on, so the transcript stays readable.
 */
export function createCliLogger(
  settings: RuntimeSettings,
  writeLog?: (line: string) => void
): Logger {
  const debug = settings.config.logging.debug;
  return new Logger({
    component: 'IdeaBlueprint',
    debugMode: debug,
    minLevel: debug ? 'debug' : 'warn',
    ...(writeLog !== undefined ? { write: writeLog } : {}),
  });
}

/**
 * Handles the chat command.
 *
 * @returns Exit code 1 when the API key is missing or access is refused.
 */
export async function handleChatCommand(options: ChatCommandOptions): Promise<CliCommandResult> {
  const { display } = options;
  const writer = options.writer ?? defaultOutputWriter;
  const settings = await loadSettings(options.settings);

  if (settings.apiKey === undefined) {
    writer.writeLine(
      formatErrorWithSuggestions('OPENAI_API_KEY is not set', { errorType: 'authentication' }, display)
    );
    return { exitCode: 1 };
  }

  const session = await createBlueprintSession(settings, {
    logger: createCliLogger(settings, options.writeLog),
    ...(options.fetch !== undefined ? { fetch: options.fetch } : {}),
  });
  const reader = options.reader ?? (await createReadlineReader());

  const cli = new ChatCli({
    session,
    reader,
    writer,
    accessGate: new AccessGate(settings.config.access.code),
    exportPath: settings.config.export.path,
    display,
  });

  return { exitCode: await cli.run() };
}
