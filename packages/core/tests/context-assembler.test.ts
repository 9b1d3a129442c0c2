import { describe, it, expect } from 'vitest';
import { ContextAssembler } from '../src/runtime/context-assembler.js';
import type { ToolDeclaration } from '../src/interfaces/tool.js';

const POLICY = 'Answer course questions.';

const SEARCH: ToolDeclaration = {
  name: 'search_course_content',
  description: 'Search course materials',
  parameters: {
    query: { type: 'string', description: 'What to search for', required: true },
  },
};

describe('ContextAssembler.assemble', () => {
  const assembler = new ContextAssembler();

  it('opens with the policy as system message, then the query', () => {
    const messages = assembler.assemble('What is RAG?', { systemPrompt: POLICY });
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ['system', POLICY],
      ['user', 'What is RAG?'],
    ]);
  });

  it('treats empty history as no history', () => {
    const messages = assembler.assemble('q', { systemPrompt: POLICY, history: '' });
    expect(messages[0]?.content).toBe(POLICY);
  });

  it('appends history under a "Previous conversation" heading', () => {
    const messages = assembler.assemble('And then?', {
      systemPrompt: POLICY,
      history: 'User: hi\nAssistant: hello',
    });
    expect(messages[0]?.content).toBe(
      'Answer course questions.\n\nPrevious conversation:\nUser: hi\nAssistant: hello'
    );
    expect(messages).toHaveLength(2);
  });

  it('gives every message its own id', () => {
    const [system, user] = assembler.assemble('q', { systemPrompt: POLICY });
    expect(system?.id).not.toBe(user?.id);
  });
});

describe('ContextAssembler.buildCompletionOptions', () => {
  const assembler = new ContextAssembler();

  it('defaults to deterministic, bounded output without tools', () => {
    expect(assembler.buildCompletionOptions('model-x', {})).toEqual({
      model: 'model-x',
      maxTokens: 800,
      temperature: 0,
    });
  });

  it('omits tools when the declaration list is empty', () => {
    const options = assembler.buildCompletionOptions('model-x', { tools: [] });
    expect(options).not.toHaveProperty('tools');
    expect(options).not.toHaveProperty('toolChoice');
  });

  it('attaches tools with automatic tool choice', () => {
    const options = assembler.buildCompletionOptions('model-x', {
      tools: [SEARCH],
      maxTokens: 256,
      temperature: 0.2,
    });
    expect(options).toEqual({
      model: 'model-x',
      maxTokens: 256,
      temperature: 0.2,
      tools: [SEARCH],
      toolChoice: 'auto',
    });
  });
});
