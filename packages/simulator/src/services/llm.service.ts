import { setTimeout as sleep } from 'node:timers/promises';
import pino from 'pino';
import type Anthropic from '@anthropic-ai/sdk';
import { TurnRole, type Turn } from '@student-sim/shared';
import anthropic from '../config/anthropic.js';
import { env } from '../config/env.js';
import { ModelError } from '../utils/errors.js';

const logger = pino({ name: 'llm.service' });

/**
 * The only thing the pipeline needs from a language model: given the
 * transcript so far, return the next reply in full.
 */
export interface ModelCapability {
  generate(history: readonly Turn[]): Promise<string>;
}

export interface AnthropicModelOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Total attempts per call, including the first. */
  retryLimit?: number;
  retryDelayMs?: number;
}

export interface AnthropicRequest {
  system: string;
  messages: Anthropic.MessageParam[];
}

// --- Pure helpers ---

/**
 * Splits a transcript into the Messages API shape. System turns become the
 * system parameter; consecutive turns of the same role (a feedback turn
 * followed by the next problem) are merged so roles alternate.
 */
export const toAnthropicRequest = (history: readonly Turn[]): AnthropicRequest => {
  const systemParts: string[] = [];
  const messages: Anthropic.MessageParam[] = [];

  for (const turn of history) {
    if (turn.role === TurnRole.SYSTEM) {
      systemParts.push(turn.text);
      continue;
    }
    const role = turn.role === TurnRole.MODEL ? 'assistant' : 'user';
    const last = messages.at(-1);
    if (last !== undefined && last.role === role && typeof last.content === 'string') {
      messages[messages.length - 1] = { role, content: `${last.content}\n\n${turn.text}` };
    } else {
      messages.push({ role, content: turn.text });
    }
  }

  return { system: systemParts.join('\n\n'), messages };
};

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

// --- Anthropic adapter ---

interface ResolvedOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  retryLimit: number;
  retryDelayMs: number;
}

async function callLlmStream(request: AnthropicRequest, options: ResolvedOptions): Promise<string> {
  const stream = anthropic.messages.stream({
    model: options.model,
    max_tokens: options.maxTokens,
    temperature: options.temperature,
    ...(request.system ? { system: request.system } : {}),
    messages: request.messages,
  });
  return stream.finalText();
}

/**
 * Model capability backed by the Anthropic Messages API.
 * An SDK error or a blank reply counts as a failed attempt. After
 * `retryLimit` failed attempts the call throws ModelError.
 */
export const createAnthropicModel = (options: AnthropicModelOptions = {}): ModelCapability => {
  const resolved: ResolvedOptions = {
    model: options.model ?? env.LLM_MODEL,
    maxTokens: options.maxTokens ?? env.LLM_MAX_TOKENS,
    temperature: options.temperature ?? env.LLM_TEMPERATURE,
    retryLimit: options.retryLimit ?? env.LLM_RETRY_LIMIT,
    retryDelayMs: options.retryDelayMs ?? env.LLM_RETRY_DELAY_MS,
  };

  return {
    async generate(history: readonly Turn[]): Promise<string> {
      const request = toAnthropicRequest(history);
      let lastError = 'No attempt made';

      for (let attempt = 1; attempt <= resolved.retryLimit; attempt++) {
        try {
          const text = await callLlmStream(request, resolved);
          if (text.trim()) return text;
          lastError = 'Empty response from model';
        } catch (err) {
          lastError = errorMessage(err);
        }

        logger.warn(
          { attempt, retryLimit: resolved.retryLimit, error: lastError },
          'LLM call failed',
        );
        if (attempt < resolved.retryLimit) {
          await sleep(resolved.retryDelayMs);
        }
      }

      throw new ModelError(`Model call failed after ${resolved.retryLimit} attempt(s)`, {
        lastError,
      });
    },
  };
};
