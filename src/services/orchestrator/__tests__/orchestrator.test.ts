import { describe, it, expect, vi } from 'vitest';
import { ToolUseOrchestrator, MAX_TOOL_ROUNDS, extractText } from '../orchestrator.js';
import { NO_RESPONSE_FALLBACK, SYSTEM_PROMPT } from '../prompts.js';
import type { ToolDispatcher } from '../types.js';
import type { BackendResponse, ToolDefinition } from '../../../providers/types.js';
import { ToolRegistry } from '../../tools/registry.js';
import { ScriptedBackend, textResponse, toolUseResponse } from '../../__tests__/fixtures.js';

const TOOLS: ToolDefinition[] = [
  {
    name: 'search_course_content',
    description: 'test',
    input_schema: { type: 'object', properties: {}, required: [] },
  },
];

function createDispatcher(result = 'search results') {
  const execute = vi.fn<ToolDispatcher['execute']>().mockResolvedValue(result);
  const dispatcher: ToolDispatcher = { execute };
  return { dispatcher, execute };
}

function createOrchestrator(backend: ScriptedBackend, maxToolRounds?: number) {
  return new ToolUseOrchestrator(backend, {
    model: 'test-model',
    maxTokens: 800,
    temperature: 0,
    maxToolRounds,
  });
}

describe('ToolUseOrchestrator', () => {
  describe('direct responses', () => {
    it('should return the text of a terminal response', async () => {
      const backend = new ScriptedBackend([textResponse('Hello!')]);

      const result = await createOrchestrator(backend).generate('What is MCP?');

      expect(result).toBe('Hello!');
      expect(backend.requests).toHaveLength(1);
    });

    it('should send base parameters and the fixed prompt', async () => {
      const backend = new ScriptedBackend([textResponse('answer')]);

      await createOrchestrator(backend).generate('What is MCP?');

      expect(backend.requests[0]).toEqual({
        model: 'test-model',
        max_tokens: 800,
        temperature: 0,
        system: SYSTEM_PROMPT,
        messages: [{ role: 'user', content: 'What is MCP?' }],
      });
    });

    it('should append conversation history to the system prompt', async () => {
      const backend = new ScriptedBackend([textResponse('follow up answer')]);

      await createOrchestrator(backend).generate('follow up', 'User: hi\nAssistant: hello');

      expect(backend.requests[0].system).toBe(
        `${SYSTEM_PROMPT}\n\nPrevious conversation:\nUser: hi\nAssistant: hello`
      );
    });

    it('should offer tools with automatic tool choice', async () => {
      const backend = new ScriptedBackend([textResponse('answer')]);

      await createOrchestrator(backend).generate('test', undefined, TOOLS);

      expect(backend.requests[0].tools).toEqual(TOOLS);
      expect(backend.requests[0].tool_choice).toEqual({ type: 'auto' });
    });

    it('should not offer tools when the list is empty', async () => {
      const backend = new ScriptedBackend([textResponse('answer')]);

      await createOrchestrator(backend).generate('test', undefined, []);

      expect(backend.requests[0]).not.toHaveProperty('tools');
      expect(backend.requests[0]).not.toHaveProperty('tool_choice');
    });

    it('should return the first text block when several are present', async () => {
      const backend = new ScriptedBackend([
        {
          stop_reason: 'end_turn',
          content: [
            { type: 'text', text: 'first' },
            { type: 'text', text: 'second' },
          ],
        },
      ]);

      await expect(createOrchestrator(backend).generate('q')).resolves.toBe('first');
    });
  });

  describe('tool rounds', () => {
    it('should execute a requested tool and send its result back', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('search_course_content', { query: 'MCP basics' }, 'tool_123'),
        textResponse('Here is what I found about MCP...'),
      ]);
      const { dispatcher, execute } = createDispatcher('[Introduction to MCP - Lesson 1]\nMCP content here');

      const result = await createOrchestrator(backend).generate('Tell me about MCP', undefined, TOOLS, dispatcher);

      expect(result).toBe('Here is what I found about MCP...');
      expect(execute).toHaveBeenCalledOnce();
      expect(execute).toHaveBeenCalledWith('search_course_content', { query: 'MCP basics' });
      expect(backend.requests).toHaveLength(2);
      expect(backend.requests[1].messages).toEqual([
        { role: 'user', content: 'Tell me about MCP' },
        {
          role: 'assistant',
          content: [{ type: 'tool_use', id: 'tool_123', name: 'search_course_content', input: { query: 'MCP basics' } }],
        },
        {
          role: 'user',
          content: [
            {
              type: 'tool_result',
              tool_use_id: 'tool_123',
              content: '[Introduction to MCP - Lesson 1]\nMCP content here',
            },
          ],
        },
      ]);
    });

    it('should keep offering tools after the first round and withhold them after the last', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('get_course_outline', { course_name: 'MCP' }, 'tool_1'),
        toolUseResponse('search_course_content', { query: 'lesson 4' }, 'tool_2'),
        textResponse('Lesson 4 covers resources.'),
      ]);
      const { dispatcher, execute } = createDispatcher();

      const result = await createOrchestrator(backend).generate('q', undefined, TOOLS, dispatcher);

      expect(result).toBe('Lesson 4 covers resources.');
      expect(execute).toHaveBeenCalledTimes(2);
      expect(backend.requests).toHaveLength(3);
      expect(backend.requests[1].tools).toEqual(TOOLS);
      expect(backend.requests[1].tool_choice).toEqual({ type: 'auto' });
      expect(backend.requests[2]).not.toHaveProperty('tools');
      expect(backend.requests[2]).not.toHaveProperty('tool_choice');
      expect(backend.requests[2].messages).toHaveLength(5);
    });

    it('should stop after the round budget and fall back when no text remains', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('search_course_content', { query: 'a' }, 'tool_1'),
        toolUseResponse('search_course_content', { query: 'b' }, 'tool_2'),
        toolUseResponse('search_course_content', { query: 'c' }, 'tool_3'),
      ]);
      const { dispatcher, execute } = createDispatcher();

      const result = await createOrchestrator(backend).generate('q', undefined, TOOLS, dispatcher);

      expect(MAX_TOOL_ROUNDS).toBe(2);
      expect(execute).toHaveBeenCalledTimes(2);
      expect(backend.requests).toHaveLength(3);
      expect(result).toBe(NO_RESPONSE_FALLBACK);
    });

    it.each([0, 1, 2, 3, 4])(
      'should bound executions and backend calls for %i consecutive tool requests',
      async (toolRequests) => {
        const responses: BackendResponse[] = [];
        for (let i = 0; i < toolRequests; i++) {
          responses.push(toolUseResponse('search_course_content', { query: `q${i}` }, `tool_${i}`));
        }
        responses.push(textResponse('done'));
        const backend = new ScriptedBackend(responses);
        const { dispatcher, execute } = createDispatcher();

        await createOrchestrator(backend).generate('q', undefined, TOOLS, dispatcher);

        const rounds = Math.min(toolRequests, MAX_TOOL_ROUNDS);
        expect(execute).toHaveBeenCalledTimes(rounds);
        expect(backend.requests).toHaveLength(rounds + 1);
      }
    );

    it('should run every tool block of a round in order and combine the results', async () => {
      const backend = new ScriptedBackend([
        {
          stop_reason: 'tool_use',
          content: [
            { type: 'text', text: 'Checking two things.' },
            { type: 'tool_use', id: 'tool_a', name: 'get_course_outline', input: { course_name: 'MCP' } },
            { type: 'tool_use', id: 'tool_b', name: 'search_course_content', input: { query: 'servers' } },
          ],
        },
        textResponse('combined answer'),
      ]);
      const execute = vi
        .fn<ToolDispatcher['execute']>()
        .mockResolvedValueOnce('outline text')
        .mockResolvedValueOnce('search text');

      await createOrchestrator(backend).generate('q', undefined, TOOLS, { execute });

      expect(execute.mock.calls.map(call => call[0])).toEqual(['get_course_outline', 'search_course_content']);
      const lastMessage = backend.requests[1].messages[2];
      expect(lastMessage).toEqual({
        role: 'user',
        content: [
          { type: 'tool_result', tool_use_id: 'tool_a', content: 'outline text' },
          { type: 'tool_result', tool_use_id: 'tool_b', content: 'search text' },
        ],
      });
    });

    it('should honour a smaller round budget', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('search_course_content', { query: 'a' }),
        textResponse('single round answer'),
      ]);
      const { dispatcher } = createDispatcher();

      const result = await createOrchestrator(backend, 1).generate('q', undefined, TOOLS, dispatcher);

      expect(result).toBe('single round answer');
      expect(backend.requests[1]).not.toHaveProperty('tools');
    });

    it('should not loop without a dispatcher', async () => {
      const backend = new ScriptedBackend([
        {
          stop_reason: 'tool_use',
          content: [
            { type: 'text', text: 'Let me search for that.' },
            { type: 'tool_use', id: 'tool_1', name: 'search_course_content', input: { query: 'x' } },
          ],
        },
      ]);

      const result = await createOrchestrator(backend).generate('q', undefined, TOOLS);

      expect(result).toBe('Let me search for that.');
      expect(backend.requests).toHaveLength(1);
    });

    it('should pass an unknown-tool message back as ordinary output', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('missing_tool', {}, 'tool_9'),
        textResponse('I could not use that tool.'),
      ]);

      await createOrchestrator(backend).generate('q', undefined, TOOLS, new ToolRegistry());

      expect(backend.requests[1].messages[2]).toEqual({
        role: 'user',
        content: [{ type: 'tool_result', tool_use_id: 'tool_9', content: "Tool 'missing_tool' not found" }],
      });
      expect(backend.requests[1].tools).toEqual(TOOLS);
    });
  });

  describe('failures', () => {
    it('should report a failed tool once and finish with one tool-less call', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('search_course_content', { query: 'x' }, 'tool_1'),
        textResponse('Sorry, the course search is unavailable right now.'),
      ]);
      const execute = vi.fn<ToolDispatcher['execute']>().mockRejectedValue(new Error('Vector store offline'));

      const result = await createOrchestrator(backend).generate('q', undefined, TOOLS, { execute });

      expect(result).toBe('Sorry, the course search is unavailable right now.');
      expect(execute).toHaveBeenCalledOnce();
      expect(backend.requests).toHaveLength(2);
      expect(backend.requests[1]).not.toHaveProperty('tools');
      expect(backend.requests[1].messages[2]).toEqual({
        role: 'user',
        content: [
          {
            type: 'tool_result',
            tool_use_id: 'tool_1',
            content: 'Error executing tool: Vector store offline',
            is_error: true,
          },
        ],
      });
    });

    it('should stop after a failed round even if the backend asks for more tools', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('search_course_content', { query: 'x' }, 'tool_1'),
        toolUseResponse('search_course_content', { query: 'y' }, 'tool_2'),
      ]);
      const execute = vi.fn<ToolDispatcher['execute']>().mockRejectedValue(new Error('boom'));

      const result = await createOrchestrator(backend).generate('q', undefined, TOOLS, { execute });

      expect(result).toBe(NO_RESPONSE_FALLBACK);
      expect(execute).toHaveBeenCalledOnce();
      expect(backend.requests).toHaveLength(2);
    });

    it('should skip the remaining tool blocks after a failure', async () => {
      const backend = new ScriptedBackend([
        {
          stop_reason: 'tool_use',
          content: [
            { type: 'tool_use', id: 'tool_a', name: 'search_course_content', input: { query: 'a' } },
            { type: 'tool_use', id: 'tool_b', name: 'search_course_content', input: { query: 'b' } },
          ],
        },
        textResponse('partial answer'),
      ]);
      const execute = vi.fn<ToolDispatcher['execute']>().mockRejectedValue(new Error('first failed'));

      await createOrchestrator(backend).generate('q', undefined, TOOLS, { execute });

      expect(execute).toHaveBeenCalledOnce();
      expect(backend.requests[1].messages[2].content).toHaveLength(1);
    });

    it('should withhold tools after a failure in the second round', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('search_course_content', { query: 'a' }, 'tool_1'),
        toolUseResponse('search_course_content', { query: 'b' }, 'tool_2'),
        textResponse('answer after failure'),
      ]);
      const execute = vi
        .fn<ToolDispatcher['execute']>()
        .mockResolvedValueOnce('first result')
        .mockRejectedValueOnce(new Error('second failed'));

      const result = await createOrchestrator(backend).generate('q', undefined, TOOLS, { execute });

      expect(result).toBe('answer after failure');
      expect(backend.requests[1].tools).toEqual(TOOLS);
      expect(backend.requests[2]).not.toHaveProperty('tools');
    });

    it('should propagate backend errors from the first call', async () => {
      const backend = new ScriptedBackend([new Error('401 Unauthorized: Invalid API key')]);

      await expect(createOrchestrator(backend).generate('test')).rejects.toThrow('401 Unauthorized');
    });

    it('should propagate backend errors from a follow-up call', async () => {
      const backend = new ScriptedBackend([
        toolUseResponse('search_course_content', { query: 'x' }),
        new Error('overloaded'),
      ]);
      const { dispatcher } = createDispatcher();

      await expect(createOrchestrator(backend).generate('q', undefined, TOOLS, dispatcher)).rejects.toThrow(
        'overloaded'
      );
    });
  });
});

describe('extractText', () => {
  it('should return null when there is no text block', () => {
    expect(extractText([{ type: 'tool_use', id: 't', name: 'n', input: {} }])).toBeNull();
    expect(extractText([])).toBeNull();
  });

  it('should return an empty text block as is', () => {
    expect(extractText([{ type: 'text', text: '' }])).toBe('');
  });

  it('should make generate fall back on an empty answer', async () => {
    const backend = new ScriptedBackend([textResponse('')]);

    await expect(createOrchestrator(backend).generate('q')).resolves.toBe(NO_RESPONSE_FALLBACK);
  });
});
