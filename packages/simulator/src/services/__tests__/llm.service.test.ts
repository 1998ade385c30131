import { describe, it, expect, vi, beforeEach } from 'vitest';

// vi.mock calls are hoisted, so the factory runs before the imports below
vi.mock('../../config/anthropic.js', () => ({
  default: {
    messages: {
      stream: vi.fn(),
    },
  },
}));

import anthropic from '../../config/anthropic.js';
import { TurnRole, type Turn } from '@student-sim/shared';
import { createAnthropicModel, toAnthropicRequest } from '../llm.service.js';
import { ModelError } from '../../utils/errors.js';

// --- Helpers ---

const mockStream = (text: string) => ({
  finalText: vi.fn().mockResolvedValue(text),
});

const failingStream = (error: Error) => ({
  finalText: vi.fn().mockRejectedValue(error),
});

type StreamReturn = ReturnType<typeof anthropic.messages.stream>;

const HISTORY: Turn[] = [
  { role: TurnRole.SYSTEM, text: 'You are simulating a student.' },
  { role: TurnRole.USER, text: 'Problem 1' },
];

beforeEach(() => {
  vi.clearAllMocks();
});

// --- toAnthropicRequest ---

describe('toAnthropicRequest', () => {
  it('lifts system turns into the system parameter', () => {
    const request = toAnthropicRequest(HISTORY);
    expect(request.system).toBe('You are simulating a student.');
    expect(request.messages).toEqual([{ role: 'user', content: 'Problem 1' }]);
  });

  it('maps model turns to the assistant role', () => {
    const request = toAnthropicRequest([
      ...HISTORY,
      { role: TurnRole.MODEL, text: 'Reply 1' },
    ]);
    expect(request.messages[1]).toEqual({ role: 'assistant', content: 'Reply 1' });
  });

  it('merges a feedback turn with the following problem turn', () => {
    const request = toAnthropicRequest([
      ...HISTORY,
      { role: TurnRole.MODEL, text: 'Reply 1' },
      { role: TurnRole.USER, text: 'Feedback 1' },
      { role: TurnRole.USER, text: 'Problem 2' },
    ]);
    expect(request.messages).toEqual([
      { role: 'user', content: 'Problem 1' },
      { role: 'assistant', content: 'Reply 1' },
      { role: 'user', content: 'Feedback 1\n\nProblem 2' },
    ]);
  });

  it('returns an empty system string when there is no system turn', () => {
    const request = toAnthropicRequest([{ role: TurnRole.USER, text: 'hi' }]);
    expect(request.system).toBe('');
  });
});

// --- createAnthropicModel ---

describe('createAnthropicModel', () => {
  it('returns the reply text on the first attempt', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream('Reply') as unknown as StreamReturn);

    const model = createAnthropicModel({ retryDelayMs: 0 });
    await expect(model.generate(HISTORY)).resolves.toBe('Reply');
    expect(anthropic.messages.stream).toHaveBeenCalledTimes(1);
  });

  it('passes model settings and the shaped transcript to the API', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream('Reply') as unknown as StreamReturn);

    const model = createAnthropicModel({
      model: 'test-model',
      maxTokens: 512,
      temperature: 0.3,
      retryDelayMs: 0,
    });
    await model.generate(HISTORY);

    expect(anthropic.messages.stream).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 512,
      temperature: 0.3,
      system: 'You are simulating a student.',
      messages: [{ role: 'user', content: 'Problem 1' }],
    });
  });

  it('omits the system parameter when the transcript has no system turn', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream('Reply') as unknown as StreamReturn);

    const model = createAnthropicModel({ retryDelayMs: 0 });
    await model.generate([{ role: TurnRole.USER, text: 'hi' }]);

    const params = vi.mocked(anthropic.messages.stream).mock.calls[0][0];
    expect(params).not.toHaveProperty('system');
  });

  it('retries after an SDK error and returns the later reply', async () => {
    vi.mocked(anthropic.messages.stream)
      .mockReturnValueOnce(failingStream(new Error('overloaded')) as unknown as StreamReturn)
      .mockReturnValueOnce(mockStream('Second try') as unknown as StreamReturn);

    const model = createAnthropicModel({ retryLimit: 3, retryDelayMs: 0 });
    await expect(model.generate(HISTORY)).resolves.toBe('Second try');
    expect(anthropic.messages.stream).toHaveBeenCalledTimes(2);
  });

  it('treats a blank reply as a failed attempt', async () => {
    vi.mocked(anthropic.messages.stream)
      .mockReturnValueOnce(mockStream('   ') as unknown as StreamReturn)
      .mockReturnValueOnce(mockStream('Real reply') as unknown as StreamReturn);

    const model = createAnthropicModel({ retryLimit: 2, retryDelayMs: 0 });
    await expect(model.generate(HISTORY)).resolves.toBe('Real reply');
  });

  it('throws ModelError once every attempt has failed', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(
      failingStream(new Error('Rate limit exceeded')) as unknown as StreamReturn,
    );

    const model = createAnthropicModel({ retryLimit: 3, retryDelayMs: 0 });
    const error = await model.generate(HISTORY).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelError);
    if (error instanceof ModelError) {
      expect(error.message).toBe('Model call failed after 3 attempt(s)');
      expect(error.details).toEqual({ lastError: 'Rate limit exceeded' });
    }
    expect(anthropic.messages.stream).toHaveBeenCalledTimes(3);
  });

  it('reports an empty reply as the last error', async () => {
    vi.mocked(anthropic.messages.stream).mockReturnValue(mockStream('') as unknown as StreamReturn);

    const model = createAnthropicModel({ retryLimit: 1, retryDelayMs: 0 });
    const error = await model.generate(HISTORY).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelError);
    if (error instanceof ModelError) {
      expect(error.details).toEqual({ lastError: 'Empty response from model' });
    }
    expect(anthropic.messages.stream).toHaveBeenCalledTimes(1);
  });
});
