import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ConversationTurn, GatewayEvent, ModelRequest, ToolDefinition } from '@pharmacy-agent/core';

// ---------------------------------------------------------------------------
// Mock openai SDK
// ---------------------------------------------------------------------------

const { mockCreate, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    readonly status: number | undefined;
    constructor(status: number | undefined, message: string) {
      super(message);
      this.status = status;
    }
  }
  return { mockCreate: vi.fn(), MockAPIError };
});

vi.mock('openai', () => ({
  default: Object.assign(
    vi.fn().mockImplementation(() => ({
      chat: { completions: { create: mockCreate } },
    })),
    { APIError: MockAPIError }
  ),
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { OpenAIGateway } from '../src/openai/openai-gateway.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function* chunks(list: unknown[]): AsyncGenerator<unknown> {
  for (const chunk of list) yield chunk;
}

function delta(d: Record<string, unknown>, finish_reason: string | null = null) {
  return { choices: [{ index: 0, delta: d, finish_reason }] };
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

const inventoryTool: ToolDefinition = {
  name: 'check_inventory',
  description: 'Check stock',
  parameters: {
    medication_id: { type: 'integer', description: 'Medication id', required: true },
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

async function collect(events: AsyncIterable<GatewayEvent>): Promise<GatewayEvent[]> {
  const out: GatewayEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('OpenAIGateway', () => {
  let gateway: OpenAIGateway;

  beforeEach(() => {
    mockCreate.mockReset();
    ordinal = 0;
    gateway = new OpenAIGateway({ apiKey: 'test-key', defaultModel: 'gpt-4o-mini' });
  });

  it('streams text deltas and completes the turn', async () => {
    mockCreate.mockResolvedValue(
      chunks([delta({ content: 'Hel' }), delta({ content: 'lo' }), delta({}, 'stop')])
    );

    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'text_delta', text: 'Hel' },
      { type: 'text_delta', text: 'lo' },
      { type: 'turn_complete', stopReason: 'end_turn' },
    ]);
  });

  it('assembles tool calls from indexed fragments', async () => {
    mockCreate.mockResolvedValue(
      chunks([
        delta({
          tool_calls: [
            { index: 0, id: 'call_1', function: { name: 'check_inventory', arguments: '{"medi' } },
          ],
        }),
        delta({ tool_calls: [{ index: 0, function: { arguments: 'cation_id":1}' } }] }),
        delta({
          tool_calls: [
            { index: 1, id: 'call_2', function: { name: 'get_medication_by_name', arguments: '' } },
          ],
        }),
        delta({}, 'tool_calls'),
      ])
    );

    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      {
        type: 'tool_call',
        call: { id: 'call_1', name: 'check_inventory', arguments: '{"medication_id":1}' },
      },
      { type: 'tool_call', call: { id: 'call_2', name: 'get_medication_by_name', arguments: '' } },
      { type: 'turn_complete', stopReason: 'tool_use' },
    ]);
  });

  it('maps a length finish to max_tokens', async () => {
    mockCreate.mockResolvedValue(chunks([delta({ content: 'cut' }, 'length')]));
    const events = await collect(gateway.stream(makeRequest()));
    expect(events.at(-1)).toEqual({ type: 'turn_complete', stopReason: 'max_tokens' });
  });

  it('sends system prompt, converted history and tools', async () => {
    mockCreate.mockResolvedValue(chunks([delta({}, 'stop')]));
    const request = makeRequest({
      systemPrompt: 'You are a pharmacy assistant.',
      temperature: 0.2,
      tools: [inventoryTool],
      messages: [
        turn({ role: 'user', content: 'Is Ibuprofen in stock?' }),
        turn({
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 'call_1', name: 'check_inventory', arguments: '{"medication_id":1}' }],
        }),
        turn({ role: 'tool', content: '{"in_stock":true}', toolCallId: 'call_1' }),
      ],
    });

    await collect(gateway.stream(request));

    expect(mockCreate).toHaveBeenCalledTimes(1);
    const [body, options] = mockCreate.mock.calls[0] ?? [];
    expect(body).toEqual({
      model: 'gpt-4o-mini',
      max_tokens: 512,
      temperature: 0.2,
      stream: true,
      tool_choice: 'auto',
      messages: [
        { role: 'system', content: 'You are a pharmacy assistant.' },
        { role: 'user', content: 'Is Ibuprofen in stock?' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            {
              id: 'call_1',
              type: 'function',
              function: { name: 'check_inventory', arguments: '{"medication_id":1}' },
            },
          ],
        },
        { role: 'tool', tool_call_id: 'call_1', content: '{"in_stock":true}' },
      ],
      tools: [
        {
          type: 'function',
          function: {
            name: 'check_inventory',
            description: 'Check stock',
            parameters: {
              type: 'object',
              properties: { medication_id: { type: 'integer', description: 'Medication id' } },
              required: ['medication_id'],
            },
          },
        },
      ],
    });
    expect(options).toEqual({ signal: request.signal });
  });

  it('omits tools when none are declared and honours a model override', async () => {
    mockCreate.mockResolvedValue(chunks([delta({}, 'stop')]));
    await collect(gateway.stream(makeRequest({ model: 'gpt-4o' })));
    const [body] = mockCreate.mock.calls[0] ?? [];
    expect(body).toMatchObject({ model: 'gpt-4o' });
    expect(body).not.toHaveProperty('tools');
    expect(body).not.toHaveProperty('temperature');
  });

  it('turns API errors into error events', async () => {
    mockCreate.mockRejectedValue(new MockAPIError(429, 'Rate limit reached'));
    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'error', code: 'http_429', message: 'Rate limit reached' },
    ]);
  });

  it('turns connection failures into error events', async () => {
    mockCreate.mockRejectedValue(new MockAPIError(undefined, 'Connection error.'));
    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'error', code: 'connection_error', message: 'Connection error.' },
    ]);
  });

  it('reports an error thrown mid-stream after the text already sent', async () => {
    async function* broken(): AsyncGenerator<unknown> {
      yield delta({ content: 'Partial' });
      throw new Error('socket hang up');
    }
    mockCreate.mockResolvedValue(broken());
    expect(await collect(gateway.stream(makeRequest()))).toEqual([
      { type: 'text_delta', text: 'Partial' },
      { type: 'error', code: 'unknown', message: 'socket hang up' },
    ]);
  });

  it('reports a stream that ends without a finish reason', async () => {
    mockCreate.mockResolvedValue(chunks([delta({ content: 'Hel' })]));
    const events = await collect(gateway.stream(makeRequest()));
    expect(events.at(-1)).toEqual({
      type: 'error',
      code: 'incomplete_stream',
      message: 'Stream ended without a finish reason',
    });
  });
});
