/**
 * Tests for the interactive chat loop.
 */

import { describe, expect, it, vi, type Mock } from 'vitest';
import { ChatCli, parseSlashCommand } from './chat.js';
import type { InputReader, OutputWriter } from './io.js';
import { BLUEPRINT_SECTIONS } from '../blueprint/sections.js';
import type { ConversationState, Mode } from '../conversation/types.js';
import {
  createFailureResult,
  createNetworkError,
  createSuccessResult,
  type CritiqueReply,
  type GatewayResult,
  type ModelGateway,
  type TurnReply,
} from '../gateway/types.js';
import { AccessGate } from '../session/access.js';
import { BlueprintSession } from '../session/session.js';
import { silentLogger } from '../utils/logger.js';

interface ScriptedReader extends InputReader {
  readonly prompts: string[];
  closed: boolean;
}

function scriptedReader(lines: readonly string[]): ScriptedReader {
  const queue = [...lines];
  const reader: ScriptedReader = {
    prompts: [],
    closed: false,
    readLine(prompt: string): Promise<string | undefined> {
      reader.prompts.push(prompt);
      return Promise.resolve(queue.shift());
    },
    close(): void {
      reader.closed = true;
    },
  };
  return reader;
}

interface CapturingWriter extends OutputWriter {
  readonly chunks: string[];
  lines(): string[];
}

function capturingWriter(): CapturingWriter {
  const chunks: string[] = [];
  return {
    chunks,
    writeLine(text: string): void {
      chunks.push(text + '\n');
    },
    write(text: string): void {
      chunks.push(text);
    },
    lines(): string[] {
      return chunks.join('').split('\n');
    },
  };
}

interface FakeGateway extends ModelGateway {
  readonly continueConversation: Mock<ModelGateway['continueConversation']>;
  readonly critique: Mock<ModelGateway['critique']>;
}

function createFakeGateway(): FakeGateway {
  return {
    continueConversation: vi.fn<ModelGateway['continueConversation']>(),
    critique: vi
      .fn<ModelGateway['critique']>()
      .mockResolvedValue(createSuccessResult<CritiqueReply>({ issues: [] })),
  };
}

function stateIn(mode: Mode, nextUserPrompt = 'Tell me more.'): ConversationState {
  return {
    mode,
    convergenceReady: mode !== 'DISCOVERY',
    confidence: {},
    directionThesis: '',
    nextUserPrompt,
  };
}

function reply(
  newState: ConversationState,
  text: string,
  blueprint?: string
): GatewayResult<TurnReply> {
  return createSuccessResult<TurnReply>({
    assistantText: text,
    newState,
    continuationId: 'resp_1',
    ...(blueprint !== undefined ? { blueprintMarkdown: blueprint } : {}),
  });
}

function fullDraft(): string {
  return BLUEPRINT_SECTIONS.map(
    (label, index) => `## ${String(index + 1)}. ${label}\n\nNotes on ${label.toLowerCase()}.`
  ).join('\n\n');
}

interface Harness {
  readonly cli: ChatCli;
  readonly session: BlueprintSession;
  readonly gateway: FakeGateway;
  readonly reader: ScriptedReader;
  readonly writer: CapturingWriter;
  readonly writeFile: Mock<(path: string, content: string) => Promise<void>>;
}

function createHarness(lines: readonly string[], accessCode = ''): Harness {
  const gateway = createFakeGateway();
  const session = new BlueprintSession({ gateway, logger: silentLogger, sessionId: 'session-1' });
  const reader = scriptedReader(lines);
  const writer = capturingWriter();
  const writeFile = vi
    .fn<(path: string, content: string) => Promise<void>>()
    .mockResolvedValue(undefined);
  const cli = new ChatCli({
    session,
    reader,
    writer,
    accessGate: new AccessGate(accessCode),
    exportPath: 'business_blueprint.md',
    writeFile,
    display: { colors: false },
  });
  return { cli, session, gateway, reader, writer, writeFile };
}

describe('parseSlashCommand', () => {
  it('should return undefined for plain messages', () => {
    expect(parseSlashCommand('I want to sell bottles')).toBeUndefined();
  });

  it('should parse known commands case-insensitively', () => {
    expect(parseSlashCommand('/STATE')).toEqual({ name: 'state' });
    expect(parseSlashCommand('/blueprint')).toEqual({ name: 'blueprint' });
    expect(parseSlashCommand('/reset')).toEqual({ name: 'reset' });
    expect(parseSlashCommand('/help')).toEqual({ name: 'help' });
    expect(parseSlashCommand('/quit')).toEqual({ name: 'quit' });
    expect(parseSlashCommand('/exit')).toEqual({ name: 'quit' });
  });

  it('should take the rest of the line as the export path', () => {
    expect(parseSlashCommand('/export')).toEqual({ name: 'export', path: undefined });
    expect(parseSlashCommand('/export  plans/my plan.md ')).toEqual({
      name: 'export',
      path: 'plans/my plan.md',
    });
  });

  it('should flag unknown commands', () => {
    expect(parseSlashCommand('/frobnicate now')).toEqual({ name: 'unknown', raw: 'frobnicate' });
  });
});

describe('ChatCli', () => {
  it('should show the welcome and exit cleanly on /quit', async () => {
    const { cli, reader, writer, gateway } = createHarness(['/quit']);

    const exitCode = await cli.run();

    expect(exitCode).toBe(0);
    expect(reader.closed).toBe(true);
    expect(writer.lines()).toContain('Idea → Business Blueprint');
    expect(gateway.continueConversation).not.toHaveBeenCalled();
  });

  it('should exit cleanly when input ends', async () => {
    const { cli, reader } = createHarness([]);

    await expect(cli.run()).resolves.toBe(0);
    expect(reader.prompts).toEqual(['\nShare your idea in plain words.\n> ']);
  });

  it('should refuse a wrong access code without calling the model', async () => {
    const { cli, writer, gateway, reader } = createHarness(['wrong', 'hello'], 'test-secret');

    const exitCode = await cli.run();

    expect(exitCode).toBe(1);
    expect(reader.prompts[0]).toBe('Access code: ');
    expect(writer.lines()).toContain('Error: Access code is not valid');
    expect(gateway.continueConversation).not.toHaveBeenCalled();
    expect(reader.closed).toBe(true);
  });

  it('should refuse when input ends at the access prompt', async () => {
    const { cli } = createHarness([], 'test-secret');

    await expect(cli.run()).resolves.toBe(1);
  });

  it('should chat after the right access code', async () => {
    const { cli, gateway, writer } = createHarness(['test-secret', 'bottles'], 'test-secret');
    gateway.continueConversation.mockResolvedValueOnce(
      reply(stateIn('DISCOVERY'), 'Who would buy first?')
    );

    await expect(cli.run()).resolves.toBe(0);
    expect(gateway.continueConversation).toHaveBeenCalledTimes(1);
    expect(writer.lines()).toContain('Who would buy first?');
  });

  it('should print replies and prompt with the next hint', async () => {
    const { cli, gateway, reader, writer } = createHarness([
      'I want to sell eco-friendly water bottles online',
    ]);
    gateway.continueConversation.mockResolvedValueOnce(
      reply(stateIn('DISCOVERY', 'Who buys first?'), 'Picture a refill club. Does that land?')
    );

    await cli.run();

    expect(gateway.continueConversation).toHaveBeenCalledWith(
      { continuationId: undefined },
      'I want to sell eco-friendly water bottles online'
    );
    expect(writer.lines()).toContain('Picture a refill club. Does that land?');
    expect(reader.prompts[1]).toBe('\nWho buys first?\n> ');
  });

  it('should skip blank lines', async () => {
    const { cli, gateway } = createHarness(['', '   ', '/quit']);

    await cli.run();

    expect(gateway.continueConversation).not.toHaveBeenCalled();
  });

  it('should announce a mode change', async () => {
    const { cli, gateway, writer } = createHarness(['yes, that is it']);
    gateway.continueConversation.mockResolvedValueOnce(
      reply(stateIn('INTENT_LOCK'), 'Locking the direction.')
    );

    await cli.run();

    expect(writer.lines()).toContain('ℹ Mode: INTENT_LOCK');
  });

  it('should print and export the blueprint produced in BUILDER mode', async () => {
    const { cli, gateway, session, writer, writeFile } = createHarness(['build it', '/export']);
    gateway.continueConversation.mockResolvedValueOnce(
      reply(stateIn('BUILDER'), 'Here is your blueprint.', fullDraft())
    );

    await cli.run();

    const lines = writer.lines();
    expect(lines).toContain('# Business Blueprint');
    expect(lines).toContain('## 11. Reality checks & risks');
    expect(lines).toContain('No internal contradictions detected.');
    expect(lines).toContain('✓ Blueprint ready. Use /export to save it.');
    expect(writeFile).toHaveBeenCalledWith('business_blueprint.md', session.blueprintMarkdown);
    expect(lines).toContain('✓ Blueprint saved to business_blueprint.md');
  });

  it('should export to a path given with the command', async () => {
    const { cli, gateway, writeFile } = createHarness(['build it', '/export plan.md']);
    gateway.continueConversation.mockResolvedValueOnce(
      reply(stateIn('BUILDER'), 'Here is your blueprint.', fullDraft())
    );

    await cli.run();

    expect(writeFile).toHaveBeenCalledTimes(1);
    expect(writeFile.mock.calls[0]?.[0]).toBe('plan.md');
  });

  it('should report a failed export', async () => {
    const { cli, gateway, writer, writeFile } = createHarness(['build it', '/export']);
    gateway.continueConversation.mockResolvedValueOnce(
      reply(stateIn('BUILDER'), 'Here is your blueprint.', fullDraft())
    );
    writeFile.mockRejectedValueOnce(new Error('disk full'));

    await expect(cli.run()).resolves.toBe(0);
    expect(writer.lines()).toContain("Error: Cannot write 'business_blueprint.md': disk full");
  });

  it('should explain that no blueprint exists yet', async () => {
    const { cli, writer, writeFile } = createHarness(['/blueprint', '/export']);

    await cli.run();

    const lines = writer.lines();
    expect(lines).toContain('ℹ Blueprint appears after Builder Mode.');
    expect(lines).toContain('⚠ Blueprint appears after Builder Mode.');
    expect(writeFile).not.toHaveBeenCalled();
  });

  it('should show the stored blueprint on /blueprint', async () => {
    const { cli, gateway, session, writer } = createHarness(['build it', '/blueprint']);
    gateway.continueConversation.mockResolvedValueOnce(
      reply(stateIn('BUILDER'), 'Here is your blueprint.', fullDraft())
    );

    await cli.run();

    const output = writer.chunks.join('');
    const markdown = session.blueprintMarkdown;
    expect(output.indexOf(markdown)).not.toBe(output.lastIndexOf(markdown));
  });

  it('should print provider errors with suggestions and keep the state', async () => {
    const { cli, gateway, session, writer } = createHarness(['bottles']);
    gateway.continueConversation.mockResolvedValueOnce(
      createFailureResult<TurnReply>(createNetworkError('connection refused'))
    );

    await cli.run();

    const lines = writer.lines();
    expect(lines).toContain('Error: connection refused');
    expect(lines).toContain('  1. Check network connectivity and try the message again');
    expect(session.state.mode).toBe('DISCOVERY');
    expect(session.turns).toHaveLength(0);
  });

  it('should warn when the model tries to move backwards', async () => {
    const { cli, gateway, writer } = createHarness(['build it', 'start over?']);
    gateway.continueConversation
      .mockResolvedValueOnce(reply(stateIn('BUILDER'), 'Building now.'))
      .mockResolvedValueOnce(reply(stateIn('DISCOVERY'), 'Let us rethink.'));

    await cli.run();

    const lines = writer.lines();
    expect(lines).toContain('Let us rethink.');
    expect(lines).toContain(
      "⚠ Mode stays BUILDER: Cannot move from 'BUILDER' back to 'DISCOVERY' without a reset"
    );
  });

  it('should show the state on /state', async () => {
    const { cli, writer } = createHarness(['/state']);

    await cli.run();

    const lines = writer.lines();
    expect(lines).toContain('Mode: DISCOVERY');
    expect(lines).toContain('Converged: no');
  });

  it('should reset the session on /reset', async () => {
    const { cli, gateway, session, writer } = createHarness(['build it', '/reset']);
    gateway.continueConversation.mockResolvedValueOnce(reply(stateIn('BUILDER'), 'Building now.'));

    await cli.run();

    expect(writer.lines()).toContain('✓ Conversation reset.');
    expect(session.state.mode).toBe('DISCOVERY');
    expect(session.turns).toHaveLength(0);
    expect(session.threadId).toBeUndefined();
  });

  it('should show help and warn on unknown commands', async () => {
    const { cli, writer } = createHarness(['/help', '/nope']);

    await cli.run();

    const lines = writer.lines();
    expect(lines).toContain('Commands');
    expect(lines).toContain('⚠ Unknown command: /nope. Type /help for commands.');
  });
});
