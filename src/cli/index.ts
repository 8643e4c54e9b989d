#!/usr/bin/env node

/**
 * Blueprint CLI entry point.
 *
 * This is the main entry point for the 'blueprint' CLI command.
 */

import { getEnvVarDocumentation } from '../config/env.js';
import { CONFIG_FILE_NAME } from '../config/loader.js';
import { handleChatCommand } from './commands/chat.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { DisplayOptions } from './format.js';
import { withErrorHandling } from './utils/errorHandling.js';

const display: DisplayOptions = {
  colors: process.stdout.isTTY === true && process.env.NO_COLOR === undefined,
};

/**
 * Builds usage information.
 */
function buildHelpText(version: string): string {
  const envDocs = Object.entries(getEnvVarDocumentation())
    .map(([name, doc]) => `  ${name.padEnd(36)} ${doc.description} (${doc.type})`)
    .join('\n');

  return `
Idea → Business Blueprint v${version}

USAGE:
  blueprint [command]

COMMANDS:
  chat        Start a conversation (default)
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help
  --version, -v  Show version information

CONFIGURATION:
  Settings are read from ./${CONFIG_FILE_NAME} when present, then from the
  environment. Environment values win.

ENVIRONMENT:
${envDocs}

EXAMPLES:
  blueprint                 Start chatting
  blueprint chat            Start chatting
`;
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "blueprint help" for usage information.');
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? 'chat';

  switch (command) {
    case 'chat':
      withErrorHandling(() => handleChatCommand({ display }), display);
      break;

    case 'help':
    case '--help':
    case '-h':
      console.log(buildHelpText(getVersionFromPackageJson()));
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand(), display);
      break;

    default:
      showError(`Unknown command: ${command}`);
      process.exit(1);
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
}
