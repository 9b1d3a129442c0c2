import { describe, it, expect } from 'vitest';
import { MessageSchema, createMessage } from '../src/interfaces/message.js';
import { ToolDeclarationSchema, CitationSchema } from '../src/interfaces/tool.js';
import { CompletionSignalSchema, CompletionOptionsSchema } from '../src/interfaces/llm-adapter.js';

// ── MessageSchema ─────────────────────────────────────────────────────────────

describe('MessageSchema', () => {
  it('accepts a valid user message', () => {
    const result = MessageSchema.safeParse({
      id: '00000000-0000-0000-0000-000000000001',
      role: 'user',
      content: 'Hello',
      timestamp: 1_700_000_000,
    });
    expect(result.success).toBe(true);
  });

  it('accepts an assistant message carrying only tool invocations', () => {
    const result = MessageSchema.safeParse({
      id: '00000000-0000-0000-0000-000000000002',
      role: 'assistant',
      content: '',
      timestamp: 1_700_000_001,
      toolCalls: [{ id: 'call_1', name: 'search_course_content', arguments: '{"query":"rag"}' }],
    });
    expect(result.success).toBe(true);
  });

  it('accepts a tool message with toolCallId', () => {
    const result = MessageSchema.safeParse({
      id: '00000000-0000-0000-0000-000000000003',
      role: 'tool',
      content: 'no results found',
      timestamp: 1_700_000_002,
      toolCallId: 'call_1',
    });
    expect(result.success).toBe(true);
  });

  it('rejects a message with invalid role', () => {
    const result = MessageSchema.safeParse({
      id: '00000000-0000-0000-0000-000000000004',
      role: 'bot',
      content: 'Hi',
      timestamp: 1_700_000_000,
    });
    expect(result.success).toBe(false);
  });

  it('rejects a message with a non-uuid id', () => {
    const result = MessageSchema.safeParse({
      id: 'not-a-uuid',
      role: 'user',
      content: 'Hi',
      timestamp: 1_700_000_000,
    });
    expect(result.success).toBe(false);
  });

  it('createMessage builds schema-valid messages', () => {
    const msg = createMessage('tool', 'result', { toolCallId: 'call_9' });
    expect(MessageSchema.parse(msg)).toEqual(msg);
    expect(msg).not.toHaveProperty('toolCalls');
  });
});

// ── ToolDeclarationSchema ─────────────────────────────────────────────────────

describe('ToolDeclarationSchema', () => {
  it('accepts snake_case names', () => {
    const result = ToolDeclarationSchema.safeParse({
      name: 'get_course_outline',
      description: 'Outline of a course',
      parameters: { course_name: { type: 'string', description: 'Course', required: true } },
    });
    expect(result.success).toBe(true);
  });

  it('rejects names that start with a digit or contain spaces', () => {
    for (const name of ['1tool', 'my tool', 'Search']) {
      const result = ToolDeclarationSchema.safeParse({ name, description: 'x', parameters: {} });
      expect(result.success).toBe(false);
    }
  });

  it('rejects an unknown parameter type', () => {
    const result = ToolDeclarationSchema.safeParse({
      name: 'x',
      description: 'x',
      parameters: { when: { type: 'date', description: 'd', required: true } },
    });
    expect(result.success).toBe(false);
  });
});

describe('CitationSchema', () => {
  it('makes the url optional', () => {
    expect(CitationSchema.safeParse({ text: 'Course A - Lesson 1' }).success).toBe(true);
  });
});

// ── CompletionSignalSchema ────────────────────────────────────────────────────

describe('CompletionSignalSchema', () => {
  it('accepts a text signal', () => {
    const result = CompletionSignalSchema.safeParse({
      type: 'text',
      content: 'Deep learning stacks many layers.',
      stopReason: 'end_turn',
    });
    expect(result.success).toBe(true);
  });

  it('rejects a tool_use signal without invocations', () => {
    const result = CompletionSignalSchema.safeParse({ type: 'tool_use', content: '', calls: [] });
    expect(result.success).toBe(false);
  });

  it('accepts an error signal', () => {
    const result = CompletionSignalSchema.safeParse({
      type: 'error',
      code: '429',
      message: 'Rate limited',
      retryable: true,
    });
    expect(result.success).toBe(true);
  });
});

describe('CompletionOptionsSchema', () => {
  it('defaults to temperature 0 and 800 output tokens', () => {
    expect(CompletionOptionsSchema.parse({ model: 'm' })).toEqual({
      model: 'm',
      maxTokens: 800,
      temperature: 0,
    });
  });
});
