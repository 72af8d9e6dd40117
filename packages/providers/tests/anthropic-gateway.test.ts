import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ConversationTurn, GatewayEvent, ModelRequest, ToolDefinition } from '@pharmacy-agent/core';

// ---------------------------------------------------------------------------
// Mock Anthropic SDK
// ---------------------------------------------------------------------------

const { mockMessagesStream, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    readonly status: number | undefined;
    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }
  return { mockMessagesStream: vi.fn(), MockAPIError };
});

vi.mock('@anthropic-ai/sdk', () => ({
  default: Object.assign(
    vi.fn().mockImplementation(() => ({
      messages: { stream: mockMessagesStream },
    })),
    { APIError: MockAPIError }
  ),
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { AnthropicGateway } from '../src/anthropic/anthropic-gateway.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* events(list: unknown[]): AsyncGenerator<unknown> {
  for (const event of list) yield event;
}

let ordinal = 0;
function turn(fields: Pick<ConversationTurn, 'role' | 'content'> & Partial<ConversationTurn>): ConversationTurn {
  return {
    id: `00000000-0000-4000-8000-00000000000${ordinal}`,
    ordinal: ordinal++,
    timestamp: 1_700_000_000,
    ...fields,
  };
}

const lookupTool: ToolDefinition = {
  name: 'get_medication_by_name',
  description: 'Find a medication',
  parameters: {
    medication_name: { type: 'string', description: 'Name', required: true },
  },
};

function makeRequest(overrides: Partial<ModelRequest> = {}): ModelRequest {
  return {
    messages: [turn({ role: 'user', content: 'Do you have Ibuprofen?' })],
    tools: [],
    maxTokens: 512,
    signal: new AbortController().signal,
    ...overrides,
  };
}

async function collect(stream: AsyncIterable<GatewayEvent>): Promise<GatewayEvent[]> {
  const out: GatewayEvent[] = [];
  for await (const event of stream) out.push(event);
  return out;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('AnthropicGateway', () => {
  let gateway: AnthropicGateway;

  beforeEach(() => {
    mockMessagesStream.mockReset();
    ordinal = 0;
    gateway = new AnthropicGateway({ apiKey: 'test-key', defaultModel: 'claude-3-5-haiku-latest' });
  });

  it('streams text and assembles tool_use blocks from JSON fragments', async () => {
    mockMessagesStream.mockReturnValue(
      events([
        { type: 'message_start', message: {} },
        { type: 'content_block_start', index: 0, content_block: { type: 'text', text: '' } },
        { type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Let me check.' } },
        { type: 'content_block_stop', index: 0 },
        {
          type: 'content_block_start',
          index: 1,
          content_block: { type: 'tool_use', id: 'toolu_1', name: 'check_inventory', input: {} },
        },
        { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '{"medication_id":' } },
        { type: 'content_block_delta', index: 1, delta: { type: 'input_json_delta', partial_json: '1}' } },
        { type: 'content_block_stop', index: 1 },
        { type: 'message_delta', delta: { stop_reason: 'tool_use' }, usage: { output_tokens: 20 } },
        { type: 'message_stop' },
      ])
    );

    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'text_delta', text: 'Let me check.' },
      {
        type: 'tool_call',
        call: { id: 'toolu_1', name: 'check_inventory', arguments: '{"medication_id":1}' },
      },
      { type: 'turn_complete', stopReason: 'tool_use' },
    ]);
  });

  it('sends empty tool input as an empty object', async () => {
    mockMessagesStream.mockReturnValue(
      events([
        {
          type: 'content_block_start',
          index: 0,
          content_block: { type: 'tool_use', id: 'toolu_2', name: 'noop', input: {} },
        },
        { type: 'content_block_stop', index: 0 },
        { type: 'message_delta', delta: { stop_reason: 'tool_use' } },
        { type: 'message_stop' },
      ])
    );
    const out = await collect(gateway.stream(makeRequest()));
    expect(out[0]).toEqual({ type: 'tool_call', call: { id: 'toolu_2', name: 'noop', arguments: '{}' } });
  });

  it('defaults to end_turn when no stop reason is reported', async () => {
    mockMessagesStream.mockReturnValue(events([{ type: 'message_stop' }]));
    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'turn_complete', stopReason: 'end_turn' },
    ]);
  });

  it('merges consecutive tool results into one user message', async () => {
    mockMessagesStream.mockReturnValue(events([{ type: 'message_stop' }]));
    const request = makeRequest({
      systemPrompt: 'You are a pharmacy assistant.',
      tools: [lookupTool],
      messages: [
        turn({ role: 'user', content: 'Ibuprofen and Amoxicillin?' }),
        turn({
          role: 'assistant',
          content: 'Checking both.',
          toolCalls: [
            { id: 'toolu_a', name: 'get_medication_by_name', arguments: '{"medication_name":"Ibuprofen"}' },
            { id: 'toolu_b', name: 'get_medication_by_name', arguments: 'not json' },
          ],
        }),
        turn({ role: 'tool', content: '{"id":1}', toolCallId: 'toolu_a' }),
        turn({ role: 'tool', content: '{"id":2}', toolCallId: 'toolu_b' }),
      ],
    });

    await collect(gateway.stream(request));

    const [body, options] = mockMessagesStream.mock.calls[0] ?? [];
    expect(body).toEqual({
      model: 'claude-3-5-haiku-latest',
      max_tokens: 512,
      system: 'You are a pharmacy assistant.',
      messages: [
        { role: 'user', content: 'Ibuprofen and Amoxicillin?' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Checking both.' },
            { type: 'tool_use', id: 'toolu_a', name: 'get_medication_by_name', input: { medication_name: 'Ibuprofen' } },
            { type: 'tool_use', id: 'toolu_b', name: 'get_medication_by_name', input: {} },
          ],
        },
        {
          role: 'user',
          content: [
            { type: 'tool_result', tool_use_id: 'toolu_a', content: '{"id":1}' },
            { type: 'tool_result', tool_use_id: 'toolu_b', content: '{"id":2}' },
          ],
        },
      ],
      tools: [
        {
          name: 'get_medication_by_name',
          description: 'Find a medication',
          input_schema: {
            type: 'object',
            properties: { medication_name: { type: 'string', description: 'Name' } },
            required: ['medication_name'],
          },
        },
      ],
    });
    expect(options).toEqual({ signal: request.signal });
  });

  it('turns API errors into error events', async () => {
    mockMessagesStream.mockImplementation(() => {
      throw new MockAPIError(529, 'Overloaded');
    });
    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'error', code: 'http_529', message: 'Overloaded' },
    ]);
  });

  it('reports a stream that ends before message_stop', async () => {
    mockMessagesStream.mockReturnValue(
      events([{ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text: 'Hi' } }])
    );
    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'text_delta', text: 'Hi' },
      { type: 'error', code: 'incomplete_stream', message: 'Stream ended before message_stop' },
    ]);
  });
});
