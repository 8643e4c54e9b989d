import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { WebhookSender } from './webhook.js';
import { TelemetryRecorder } from './recorder.js';
import type { TelemetryRecord } from './types.js';
import { Logger, silentLogger } from '../utils/logger.js';

const RECORD: TelemetryRecord = {
  timestamp_utc: '2026-01-01T09:30:00.000Z',
  session_id: 'session-1',
  role: 'user',
  message: 'I want to sell eco-friendly water bottles online',
};

describe('WebhookSender', () => {
  let mockFetch: Mock<typeof fetch>;
  let sender: WebhookSender;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    sender = new WebhookSender({ timeoutMs: 1000, fetch: mockFetch, logger: silentLogger });
  });

  it('should send POST request with correct headers and body', async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 200 }));

    await sender.send('https://hooks.example.com/turns', RECORD);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch).toHaveBeenCalledWith('https://hooks.example.com/turns', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(RECORD),
      signal: expect.any(AbortSignal) as AbortSignal,
    });
  });

  it('should return success with status code on successful response', async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));

    const result = await sender.send('https://hooks.example.com/turns', RECORD);

    expect(result).toEqual({ success: true, statusCode: 204 });
  });

  it('should return failure for non-2xx responses', async () => {
    mockFetch.mockResolvedValueOnce(
      new Response('nope', { status: 500, statusText: 'Internal Server Error' })
    );

    const result = await sender.send('https://hooks.example.com/turns', RECORD);

    expect(result).toEqual({ success: false, error: 'HTTP 500: Internal Server Error' });
  });

  it('should return failure when fetch throws', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Connection refused'));

    const result = await sender.send('https://hooks.example.com/turns', RECORD);

    expect(result).toEqual({ success: false, error: 'Connection refused' });
  });

  it('should report a timeout when the request is aborted', async () => {
    const abortError = new Error('This operation was aborted');
    abortError.name = 'AbortError';
    mockFetch.mockRejectedValueOnce(abortError);

    const result = await sender.send('https://hooks.example.com/turns', RECORD);

    expect(result).toEqual({ success: false, error: 'Request timeout after 1000ms' });
  });

  it('should abort a request that outlives the timeout', async () => {
    vi.useFakeTimers();
    try {
      mockFetch.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const error = new Error('aborted');
              error.name = 'AbortError';
              reject(error);
            });
          })
      );

      const pending = sender.send('https://hooks.example.com/turns', RECORD);
      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toEqual({
        success: false,
        error: 'Request timeout after 1000ms',
      });
    } finally {
      vi.useRealTimers();
    }
  });

  it('should log failures at debug level only', async () => {
    const lines: string[] = [];
    const logged = new WebhookSender({
      fetch: mockFetch,
      logger: new Logger({ component: 'test', debugMode: true, write: (line) => lines.push(line) }),
    });
    mockFetch.mockRejectedValueOnce(new Error('Connection refused'));

    await logged.send('https://hooks.example.com/turns', RECORD);

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 'debug',
      component: 'Telemetry',
      event: 'webhook_failed',
      data: { endpoint: 'https://hooks.example.com/turns', error: 'Connection refused' },
    });
  });
});

describe('TelemetryRecorder', () => {
  const fixedNow = (): Date => new Date('2026-01-01T09:30:00.000Z');

  it('should be disabled when no webhook URL is configured', () => {
    const send = vi.fn();
    const recorder = new TelemetryRecorder({
      webhookUrl: '  ',
      sessionId: 'session-1',
      sender: { send },
    });

    recorder.record('user', 'hello');

    expect(recorder.enabled).toBe(false);
    expect(send).not.toHaveBeenCalled();
  });

  it('should post one record per turn with session id and UTC timestamp', async () => {
    const send = vi.fn().mockResolvedValue({ success: true, statusCode: 200 });
    const recorder = new TelemetryRecorder({
      webhookUrl: 'https://hooks.example.com/turns',
      sessionId: 'session-1',
      sender: { send },
      now: fixedNow,
    });

    recorder.record('user', RECORD.message);
    recorder.record('assistant', 'Which buyer do you picture first?');
    await recorder.flush();

    expect(send).toHaveBeenNthCalledWith(1, 'https://hooks.example.com/turns', RECORD);
    expect(send).toHaveBeenNthCalledWith(2, 'https://hooks.example.com/turns', {
      ...RECORD,
      role: 'assistant',
      message: 'Which buyer do you picture first?',
    });
    expect(recorder.pendingCount).toBe(0);
  });

  it('should return before the send settles', async () => {
    let settle = (): void => undefined;
    const send = vi.fn(
      () =>
        new Promise<{ success: true; statusCode: number }>((resolve) => {
          settle = () => {
            resolve({ success: true, statusCode: 200 });
          };
        })
    );
    const recorder = new TelemetryRecorder({
      webhookUrl: 'https://hooks.example.com/turns',
      sessionId: 'session-1',
      sender: { send },
    });

    recorder.record('user', 'hello');

    expect(recorder.pendingCount).toBe(1);
    settle();
    await recorder.flush();
    expect(recorder.pendingCount).toBe(0);
  });

  it('should swallow a rejecting sender', async () => {
    const send = vi.fn().mockRejectedValue(new Error('boom'));
    const recorder = new TelemetryRecorder({
      webhookUrl: 'https://hooks.example.com/turns',
      sessionId: 'session-1',
      sender: { send },
      logger: silentLogger,
    });

    recorder.record('assistant', 'reply');

    await expect(recorder.flush()).resolves.toBeUndefined();
    expect(recorder.pendingCount).toBe(0);
  });
});
