/**
 * Interactive chat loop.
 *
 * Reads messages from the terminal, runs them through a
 * {@link BlueprintSession} and prints replies, mode changes and blueprints.
 * Lines starting with `/` are commands.
 *
 * @packageDocumentation
 */

import { writeFile as writeFileToDisk } from 'node:fs/promises';
import { BLUEPRINT_TITLE } from '../blueprint/sections.js';
import { renderBlueprint } from '../blueprint/document.js';
import type { AccessGate } from '../session/access.js';
import { AccessDeniedError, SessionError } from '../session/errors.js';
import type { BlueprintSession, TurnOutcome } from '../session/session.js';
import { classifyError, formatErrorWithSuggestions, formatProviderError } from './errors.js';
import {
  NO_BLUEPRINT_MESSAGE,
  formatChatHelp,
  formatError,
  formatInfo,
  formatPrompt,
  formatSectionHeader,
  formatStateSummary,
  formatSuccess,
  formatWarning,
  formatWelcome,
  paint,
  type DisplayOptions,
} from './format.js';
import type { InputReader, OutputWriter } from './io.js';

/**
 * A parsed chat command.
 */
export type SlashCommand =
  | { readonly name: 'state' }
  | { readonly name: 'blueprint' }
  | { readonly name: 'export'; readonly path: string | undefined }
  | { readonly name: 'reset' }
  | { readonly name: 'help' }
  | { readonly name: 'quit' }
  | { readonly name: 'unknown'; readonly raw: string };

/**
 * Parses a chat command.
 *
 * @returns The command, or `undefined` when the input is a plain message.
 *
 * @example
 * ```typescript
 * parseSlashCommand('/export plan.md'); // { name: 'export', path: 'plan.md' }
 * parseSlashCommand('hello');           // undefined
 * ```
 */
export function parseSlashCommand(input: string): SlashCommand | undefined {
  const trimmed = input.trim();
  if (!trimmed.startsWith('/')) {
    return undefined;
  }

  const [head = '', ...rest] = trimmed.slice(1).split(/\s+/);
  const argument = rest.join(' ');

  switch (head.toLowerCase()) {
    case 'state':
      return { name: 'state' };
    case 'blueprint':
      return { name: 'blueprint' };
    case 'export':
      return { name: 'export', path: argument !== '' ? argument : undefined };
    case 'reset':
      return { name: 'reset' };
    case 'help':
      return { name: 'help' };
    case 'quit':
    case 'exit':
      return { name: 'quit' };
    default:
      return { name: 'unknown', raw: head };
  }
}

/**
 * Options for a ChatCli.
 */
export interface ChatCliOptions {
  readonly session: BlueprintSession;
  readonly reader: InputReader;
  readonly writer: OutputWriter;
  /** Checked once before the first message. */
  readonly accessGate?: AccessGate;
  /** File written by `/export` without an argument. */
  readonly exportPath: string;
  /** Replaceable in tests. */
  readonly writeFile?: (path: string, content: string) => Promise<void>;
  readonly display: DisplayOptions;
}

/**
 * Terminal front end for one session.
 */
export class ChatCli {
  private readonly session: BlueprintSession;
  private readonly reader: InputReader;
  private readonly writer: OutputWriter;
  private readonly accessGate: AccessGate | undefined;
  private readonly exportPath: string;
  private readonly writeFile: (path: string, content: string) => Promise<void>;
  private readonly display: DisplayOptions;

  constructor(options: ChatCliOptions) {
    this.session = options.session;
    this.reader = options.reader;
    this.writer = options.writer;
    this.accessGate = options.accessGate;
    this.exportPath = options.exportPath;
    this.writeFile =
      options.writeFile ??
      ((path: string, content: string) => writeFileToDisk(path, content, 'utf8'));
    this.display = options.display;
  }

  /**
   * Runs the chat until the user quits or input ends.
   *
   * @returns Process exit code: 0 on a normal exit, 1 when access is refused.
   */
  async run(): Promise<number> {
    this.writer.writeLine(formatWelcome(this.display));

    try {
      if (!(await this.unlock())) {
        return 1;
      }
      await this.loop();
      return 0;
    } finally {
      this.reader.close();
      await this.session.flush();
    }
  }

  private async unlock(): Promise<boolean> {
    if (this.accessGate === undefined || !this.accessGate.required) {
      return true;
    }

    const answer = await this.reader.readLine('Access code: ');
    if (answer !== undefined && this.accessGate.check(answer)) {
      return true;
    }

    const error = new AccessDeniedError();
    this.writer.writeLine(
      formatErrorWithSuggestions(error.message, { errorType: classifyError(error) }, this.display)
    );
    return false;
  }

  private async loop(): Promise<void> {
    for (;;) {
      const line = await this.reader.readLine(
        formatPrompt(this.session.state.nextUserPrompt, this.display)
      );
      if (line === undefined) {
        return;
      }

      const input = line.trim();
      if (input === '') {
        continue;
      }

      const command = parseSlashCommand(input);
      if (command === undefined) {
        await this.send(input);
        continue;
      }
      if (command.name === 'quit') {
        return;
      }
      await this.runCommand(command);
    }
  }

  private async send(text: string): Promise<void> {
    this.writer.writeLine(paint('Thinking…', 'DIM', this.display));

    let outcome: TurnOutcome;
    try {
      outcome = await this.session.submit(text);
    } catch (error) {
      if (error instanceof SessionError) {
        this.writer.writeLine(formatError(error.message, this.display));
        return;
      }
      throw error;
    }

    this.showOutcome(outcome);
  }

  private showOutcome(outcome: TurnOutcome): void {
    switch (outcome.status) {
      case 'accepted':
        this.writer.writeLine('');
        this.writer.writeLine(outcome.assistantText);
        if (outcome.modeChanged) {
          this.writer.writeLine(formatInfo(`Mode: ${outcome.state.mode}`, this.display));
        }
        if (outcome.blueprint !== undefined) {
          this.writer.writeLine(formatSectionHeader(BLUEPRINT_TITLE, this.display));
          this.writer.write(renderBlueprint(outcome.blueprint));
          this.writer.writeLine(formatSuccess('Blueprint ready. Use /export to save it.', this.display));
        }
        return;
      case 'transition_rejected':
        this.writer.writeLine('');
        this.writer.writeLine(outcome.assistantText);
        this.writer.writeLine(
          formatWarning(`Mode stays ${outcome.state.mode}: ${outcome.error.message}`, this.display)
        );
        return;
      case 'provider_error':
        this.writer.writeLine(formatProviderError(outcome.error, this.display));
        return;
      case 'discarded':
        return;
      default: {
        const exhaustiveCheck: never = outcome;
        return exhaustiveCheck;
      }
    }
  }

  private async runCommand(command: Exclude<SlashCommand, { name: 'quit' }>): Promise<void> {
    switch (command.name) {
      case 'state':
        this.writer.writeLine(formatStateSummary(this.session.state, this.display));
        return;
      case 'blueprint': {
        const markdown = this.session.blueprintMarkdown;
        if (markdown === '') {
          this.writer.writeLine(formatInfo(NO_BLUEPRINT_MESSAGE, this.display));
        } else {
          this.writer.write(markdown);
        }
        return;
      }
      case 'export':
        await this.exportBlueprint(command.path ?? this.exportPath);
        return;
      case 'reset':
        this.session.reset();
        this.writer.writeLine(formatSuccess('Conversation reset.', this.display));
        return;
      case 'help':
        this.writer.writeLine(formatChatHelp(this.display));
        return;
      case 'unknown':
        this.writer.writeLine(
          formatWarning(`Unknown command: /${command.raw}. Type /help for commands.`, this.display)
        );
        return;
      default: {
        const exhaustiveCheck: never = command;
        return exhaustiveCheck;
      }
    }
  }

  private async exportBlueprint(path: string): Promise<void> {
    const markdown = this.session.blueprintMarkdown;
    if (markdown === '') {
      this.writer.writeLine(formatWarning(NO_BLUEPRINT_MESSAGE, this.display));
      return;
    }

    try {
      await this.writeFile(path, markdown);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.writer.writeLine(formatError(`Cannot write '${path}': ${message}`, this.display));
      return;
    }
    this.writer.writeLine(formatSuccess(`Blueprint saved to ${path}`, this.display));
  }
}
