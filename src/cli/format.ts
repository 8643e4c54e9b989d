/**
 * Text formatting for the chat CLI.
 *
 * @packageDocumentation
 */

import type { ConversationState } from '../conversation/types.js';

/**
 * Display options for formatted output.
 */
export interface DisplayOptions {
  /** Whether to emit ANSI colour codes. */
  readonly colors: boolean;
}

/**
 * Formatted text styles for CLI output.
 */
export const CLI_STYLES = {
  /** Bold text marker. */
  BOLD: '\x1b[1m',
  /** Reset formatting. */
  RESET: '\x1b[0m',
  /** Dim/gray text. */
  DIM: '\x1b[2m',
  /** Green text for success. */
  GREEN: '\x1b[32m',
  /** Yellow text for warnings. */
  YELLOW: '\x1b[33m',
  /** Cyan text for info. */
  CYAN: '\x1b[36m',
  /** Red text for errors. */
  RED: '\x1b[31m',
} as const;

/**
 * Name of a text style.
 */
export type StyleName = Exclude<keyof typeof CLI_STYLES, 'RESET'>;

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Applies a style when colours are enabled.
 */
export function paint(text: string, style: StyleName, options: DisplayOptions): string {
  return options.colors ? `${CLI_STYLES[style]}${text}${CLI_STYLES.RESET}` : text;
}

/**
 * Strips ANSI escape sequences from a string.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}

/**
 * Title shown at the top of a chat.
 */
export const APP_TITLE = 'Idea → Business Blueprint';

/**
 * One-line description under the title.
 */
export const APP_CAPTION = 'Turn a vague idea into a clear, execution-ready business';

/**
 * Notice shown before the chat starts.
 */
export const ASSUMPTIONS_NOTICE =
  'This tool structures thinking. Assumptions and risks are explicitly labelled. Validate them before execution.';

/**
 * Shown by /blueprint and /export before a blueprint exists.
 */
export const NO_BLUEPRINT_MESSAGE = 'Blueprint appears after Builder Mode.';

const TESTER_INSTRUCTIONS = [
  'Type messy thoughts',
  'React, don’t over-explain',
  'Say what feels wrong',
  'Stop when blueprint appears',
] as const;

/**
 * Formats a section header for CLI display.
 *
 * @param title - The section title.
 * @returns Formatted header string.
 */
export function formatSectionHeader(title: string, options: DisplayOptions): string {
  const line = '═'.repeat(Math.max(title.length, 40));
  return `\n${paint(line, 'CYAN', options)}\n${paint(title, 'BOLD', options)}\n${paint(line, 'CYAN', options)}\n`;
}

/**
 * Formats the input prompt with the state's hint.
 */
export function formatPrompt(hint: string, options: DisplayOptions): string {
  return `\n${paint(hint, 'DIM', options)}\n> `;
}

export function formatError(message: string, options: DisplayOptions): string {
  return paint(`Error: ${message}`, 'RED', options);
}

export function formatSuccess(message: string, options: DisplayOptions): string {
  return paint(`✓ ${message}`, 'GREEN', options);
}

export function formatWarning(message: string, options: DisplayOptions): string {
  return paint(`⚠ ${message}`, 'YELLOW', options);
}

export function formatInfo(message: string, options: DisplayOptions): string {
  return paint(`ℹ ${message}`, 'CYAN', options);
}

/**
 * Formats the text shown when a chat starts.
 */
export function formatWelcome(options: DisplayOptions): string {
  const lines = [
    formatSectionHeader(APP_TITLE, options),
    paint(APP_CAPTION, 'DIM', options),
    '',
    formatInfo(ASSUMPTIONS_NOTICE, options),
    '',
    paint('Tester instructions', 'BOLD', options),
    ...TESTER_INSTRUCTIONS.map((item) => `  • ${item}`),
    '',
    paint('Type /help for commands.', 'DIM', options),
  ];
  return lines.join('\n');
}

/**
 * Formats the session state for /state.
 */
export function formatStateSummary(state: ConversationState, options: DisplayOptions): string {
  const lines = [
    `${paint('Mode:', 'BOLD', options)} ${state.mode}`,
    `${paint('Converged:', 'BOLD', options)} ${state.convergenceReady ? 'yes' : 'no'}`,
  ];

  if (state.directionThesis !== '') {
    lines.push(`${paint('Direction:', 'BOLD', options)} ${state.directionThesis}`);
  }

  const topics = Object.entries(state.confidence);
  if (topics.length > 0) {
    lines.push(paint('Confidence:', 'BOLD', options));
    for (const [topic, score] of topics) {
      lines.push(`  ${topic}: ${String(score)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Formats the list of chat commands.
 */
export function formatChatHelp(options: DisplayOptions): string {
  const commands: readonly (readonly [string, string])[] = [
    ['/state', 'Show the current mode and whether the idea has converged'],
    ['/blueprint', 'Show the latest blueprint'],
    ['/export [path]', 'Save the latest blueprint as Markdown'],
    ['/reset', 'Start over with a fresh conversation'],
    ['/help', 'Show this list'],
    ['/quit', 'Leave the chat'],
  ];
  const width = Math.max(...commands.map(([name]) => name.length));

  return [
    paint('Commands', 'BOLD', options),
    ...commands.map(
      ([name, description]) => `  ${paint(name.padEnd(width), 'CYAN', options)}  ${description}`
    ),
  ].join('\n');
}
