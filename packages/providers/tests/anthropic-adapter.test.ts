import { describe, it, expect, vi } from 'vitest';
import Anthropic from '@anthropic-ai/sdk';
import { createMessage, type CompletionOptions, type Message, type ToolDeclaration } from '@course-rag/core';
import { AnthropicAdapter } from '../src/anthropic/anthropic-adapter.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

type Reply = Pick<Anthropic.Message, 'content' | 'stop_reason'>;

function makeAdapter(reply: Reply | Error) {
  const create = vi.fn(async (_body: Anthropic.MessageCreateParamsNonStreaming): Promise<Reply> => {
    if (reply instanceof Error) throw reply;
    return reply;
  });
  const adapter = new AnthropicAdapter({
    apiKey: 'test-secret',
    defaultModel: 'claude-3-5-haiku-20241022',
    client: { messages: { create } },
  });
  return { adapter, create };
}

const TEXT_REPLY: Reply = {
  content: [{ type: 'text', text: 'Embeddings map text to vectors.' }],
  stop_reason: 'end_turn',
};

const SEARCH: ToolDeclaration = {
  name: 'search_course_content',
  description: 'Search course materials',
  parameters: {
    query: { type: 'string', description: 'What to search for', required: true },
  },
};

const OPTIONS: CompletionOptions = { model: '', maxTokens: 800, temperature: 0 };

function toolRound(): Message[] {
  return [
    createMessage('system', 'policy'),
    createMessage('user', 'What is an embedding?'),
    createMessage('assistant', '', {
      toolCalls: [
        { id: 'toolu_1', name: 'search_course_content', arguments: '{"query":"embedding"}' },
        { id: 'toolu_2', name: 'search_course_content', arguments: '{"query":"vector"}' },
      ],
    }),
    createMessage('tool', 'first result', { toolCallId: 'toolu_1' }),
    createMessage('tool', 'second result', { toolCallId: 'toolu_2' }),
  ];
}

// ── Request shape ─────────────────────────────────────────────────────────────

describe('AnthropicAdapter — request', () => {
  it('lifts system messages out and falls back to the default model', async () => {
    const { adapter, create } = makeAdapter(TEXT_REPLY);

    await adapter.complete(
      [createMessage('system', 'policy'), createMessage('user', 'What is an embedding?')],
      OPTIONS
    );

    expect(create.mock.calls[0]?.[0]).toEqual({
      model: 'claude-3-5-haiku-20241022',
      max_tokens: 800,
      temperature: 0,
      system: 'policy',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'What is an embedding?' }] }],
    });
  });

  it('declares tools with an input schema and auto tool choice', async () => {
    const { adapter, create } = makeAdapter(TEXT_REPLY);

    await adapter.complete([createMessage('user', 'q')], {
      ...OPTIONS,
      tools: [SEARCH],
      toolChoice: 'auto',
    });

    const body = create.mock.calls[0]?.[0];
    expect(body?.tool_choice).toEqual({ type: 'auto' });
    expect(body?.tools).toEqual([
      {
        name: 'search_course_content',
        description: 'Search course materials',
        input_schema: {
          type: 'object',
          properties: { query: { type: 'string', description: 'What to search for' } },
          required: ['query'],
        },
      },
    ]);
  });

  it('uses native tool blocks and groups results into one user turn when tools are declared', async () => {
    const { adapter, create } = makeAdapter(TEXT_REPLY);

    await adapter.complete(toolRound(), { ...OPTIONS, tools: [SEARCH] });

    expect(create.mock.calls[0]?.[0].messages).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'What is an embedding?' }] },
      {
        role: 'assistant',
        content: [
          { type: 'tool_use', id: 'toolu_1', name: 'search_course_content', input: { query: 'embedding' } },
          { type: 'tool_use', id: 'toolu_2', name: 'search_course_content', input: { query: 'vector' } },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'toolu_1', content: 'first result' },
          { type: 'tool_result', tool_use_id: 'toolu_2', content: 'second result' },
        ],
      },
    ]);
  });

  it('renders the tool exchange as text on a follow-up without tools', async () => {
    const { adapter, create } = makeAdapter(TEXT_REPLY);

    await adapter.complete(toolRound(), OPTIONS);

    const body = create.mock.calls[0]?.[0];
    expect(body?.tools).toBeUndefined();
    expect(body?.messages).toEqual([
      { role: 'user', content: [{ type: 'text', text: 'What is an embedding?' }] },
      {
        role: 'assistant',
        content: [
          {
            type: 'text',
            text:
              'Called tool search_course_content with {"query":"embedding"}\n' +
              'Called tool search_course_content with {"query":"vector"}',
          },
        ],
      },
      {
        role: 'user',
        content: [
          { type: 'text', text: 'Tool result:\nfirst result' },
          { type: 'text', text: 'Tool result:\nsecond result' },
        ],
      },
    ]);
  });
});

// ── Response normalization ────────────────────────────────────────────────────

describe('AnthropicAdapter — response', () => {
  it('maps text blocks to a text signal', async () => {
    const { adapter } = makeAdapter(TEXT_REPLY);

    await expect(adapter.complete([createMessage('user', 'q')], OPTIONS)).resolves.toEqual({
      type: 'text',
      content: 'Embeddings map text to vectors.',
      stopReason: 'end_turn',
    });
  });

  it('serializes tool_use input into the invocation arguments', async () => {
    const { adapter } = makeAdapter({
      content: [
        { type: 'text', text: 'Let me search.' },
        {
          type: 'tool_use',
          id: 'toolu_7',
          name: 'search_course_content',
          input: { query: 'attention', lesson_number: 2 },
        },
      ],
      stop_reason: 'tool_use',
    });

    const signal = await adapter.complete([createMessage('user', 'q')], OPTIONS);

    expect(signal).toEqual({
      type: 'tool_use',
      content: 'Let me search.',
      calls: [
        {
          id: 'toolu_7',
          name: 'search_course_content',
          arguments: '{"query":"attention","lesson_number":2}',
        },
      ],
    });
  });

  it('reports max_tokens stops', async () => {
    const { adapter } = makeAdapter({ ...TEXT_REPLY, stop_reason: 'max_tokens' });

    const signal = await adapter.complete([createMessage('user', 'q')], OPTIONS);

    expect(signal).toMatchObject({ type: 'text', stopReason: 'max_tokens' });
  });
});

// ── Errors ────────────────────────────────────────────────────────────────────

describe('AnthropicAdapter — errors', () => {
  it('marks rate limits as retryable', async () => {
    const { adapter } = makeAdapter(new Anthropic.APIError(429, undefined, 'Too many requests', undefined));

    const signal = await adapter.complete([createMessage('user', 'q')], OPTIONS);

    expect(signal).toMatchObject({ type: 'error', code: '429', retryable: true });
  });

  it('normalizes anything else as unknown', async () => {
    const { adapter } = makeAdapter(new TypeError('fetch failed'));

    await expect(adapter.complete([createMessage('user', 'q')], OPTIONS)).resolves.toEqual({
      type: 'error',
      code: 'unknown',
      message: 'fetch failed',
      retryable: false,
    });
  });
});
