import { describe, expect, it, vi } from 'vitest';
import { createBlueprintSession } from './factory.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/types.js';
import { silentLogger } from '../utils/logger.js';

function responsesReply(): Response {
  const payload = {
    assistant_message: 'Picture a refill club for office teams. Does that land?',
    state: {
      mode: 'DISCOVERY',
      convergence_ready: false,
      confidence: [{ topic: 'direction', score: 2 }],
      direction_thesis: '',
      next_user_prompt: 'Who buys first?',
    },
    blueprint_md: null,
  };
  return new Response(
    JSON.stringify({
      id: 'resp_1',
      output: [
        {
          type: 'message',
          role: 'assistant',
          content: [{ type: 'output_text', text: JSON.stringify(payload) }],
        },
      ],
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } }
  );
}

function configWith(webhookUrl: string): Config {
  return {
    ...DEFAULT_CONFIG,
    telemetry: { ...DEFAULT_CONFIG.telemetry, webhook_url: webhookUrl },
  };
}

describe('createBlueprintSession', () => {
  it('should wire the gateway from settings', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(responsesReply());
    const session = await createBlueprintSession(
      { config: configWith(''), apiKey: 'test-secret' },
      { fetch: fetchMock, logger: silentLogger, sessionId: 'session-1' }
    );

    const outcome = await session.submit('I want to sell eco-friendly water bottles online');

    expect(outcome.status).toBe('accepted');
    expect(session.id).toBe('session-1');
    expect(session.state.nextUserPrompt).toBe('Who buys first?');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.openai.com/v1/responses');
  });

  it('should post turns to the webhook when one is configured', async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(responsesReply())
      .mockResolvedValue(new Response(null, { status: 200 }));
    const session = await createBlueprintSession(
      { config: configWith('https://hooks.example.com/turns'), apiKey: 'test-secret' },
      { fetch: fetchMock, logger: silentLogger, sessionId: 'session-1' }
    );

    await session.submit('bottles');
    await session.flush();

    const webhookCalls = fetchMock.mock.calls.filter(
      ([url]) => url === 'https://hooks.example.com/turns'
    );
    expect(webhookCalls).toHaveLength(2);
    expect(JSON.parse(String(webhookCalls[0]?.[1]?.body))).toMatchObject({
      session_id: 'session-1',
      role: 'user',
      message: 'bottles',
    });
  });

  it('should generate a session id when none is given', async () => {
    const session = await createBlueprintSession(
      { config: configWith(''), apiKey: undefined },
      { fetch: vi.fn<typeof fetch>(), logger: silentLogger }
    );

    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});
