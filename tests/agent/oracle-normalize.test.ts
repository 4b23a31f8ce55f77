import { describe, expect, it } from 'vitest';

import { assistantMessage, userMessage } from '../../src/agent/messages.js';
import { normalizeBackendReply, stripJsonFence } from '../../src/agent/oracle/normalize.js';
import type { OracleDecision } from '../../src/agent/oracle/types.js';
import { MalformedDecisionError } from '../../src/core/errors.js';

const goal = [userMessage('Check NVDA')];

function callsOf(decision: OracleDecision) {
  return decision.message.toolCalls.map((call) => ({ id: call.id, name: call.toolName, args: call.arguments }));
}

describe('normalizeBackendReply', () => {
  it('returns plain text as a final answer', () => {
    const decision = normalizeBackendReply({ content: 'NVDA looks fine.' }, goal);
    expect(decision).toEqual({ kind: 'final', message: assistantMessage('NVDA looks fine.') });
  });

  it('keeps JSON text that is not a tool call as the answer', () => {
    const decision = normalizeBackendReply({ content: '{"price": 5}' }, goal);
    expect(decision.kind).toBe('final');
    expect(decision.message.content).toBe('{"price": 5}');
  });

  it('assigns sequential ids to native calls without one', () => {
    const decision = normalizeBackendReply(
      { toolCalls: [{ name: 'lookup', arguments: { ticker: 'A' } }, { name: 'lookup', arguments: { ticker: 'B' } }] },
      goal
    );
    expect(decision.kind).toBe('tool_calls');
    expect(callsOf(decision)).toEqual([
      { id: 'call_1', name: 'lookup', args: { ticker: 'A' } },
      { id: 'call_2', name: 'lookup', args: { ticker: 'B' } },
    ]);
  });

  it('skips generated ids that are already taken', () => {
    const history = [
      userMessage('Check NVDA'),
      assistantMessage('', [{ id: 'call_2', toolName: 'lookup', arguments: {} }]),
    ];
    const decision = normalizeBackendReply({ toolCalls: [{ name: 'lookup', arguments: {} }] }, history);
    expect(decision.message.toolCalls[0].id).toBe('call_3');
  });

  it('reads the OpenAI nested shape with string arguments', () => {
    const decision = normalizeBackendReply(
      {
        content: null,
        toolCalls: [{ id: 'abc', type: 'function', function: { name: 'lookup', arguments: '{"ticker":"A"}' } }],
      },
      goal
    );
    expect(callsOf(decision)).toEqual([{ id: 'abc', name: 'lookup', args: { ticker: 'A' } }]);
    expect(decision.message.content).toBe('');
  });

  it('extracts tool calls written as fenced JSON in the text', () => {
    const content = '```json\n{"tool_calls":[{"name":"lookup","arguments":{"ticker":"A"}}]}\n```';
    const decision = normalizeBackendReply({ content }, goal);
    expect(decision.kind).toBe('tool_calls');
    expect(decision.message.content).toBe('');
    expect(callsOf(decision)).toEqual([{ id: 'call_1', name: 'lookup', args: { ticker: 'A' } }]);
  });

  it('extracts a single call object from the text', () => {
    const decision = normalizeBackendReply({ content: '{"name":"lookup","arguments":""}' }, goal);
    expect(callsOf(decision)).toEqual([{ id: 'call_1', name: 'lookup', args: {} }]);
  });

  it.each([
    [{ content: '' }, 'backend returned neither tool calls nor text'],
    ['just a string', 'backend reply is not an object with content or tool calls'],
    [{ content: '{"tool_calls": [oops' }, 'tool call payload is not valid JSON'],
    [{ content: '{"tool_calls": "lookup"}' }, 'tool_calls must be an array'],
    [{ toolCalls: [{ arguments: {} }] }, 'tool call #1 has no tool name'],
    [{ toolCalls: [{ name: 'lookup', arguments: '{bad' }] }, 'arguments for "lookup" are not valid JSON'],
    [{ toolCalls: [{ name: 'lookup', arguments: '[1]' }] }, 'arguments for "lookup" must be a JSON object'],
  ])('rejects %j', (raw, message) => {
    expect(() => normalizeBackendReply(raw, goal)).toThrow(MalformedDecisionError);
    expect(() => normalizeBackendReply(raw, goal)).toThrow(message);
  });

  it('rejects an id already used in the session', () => {
    const history = [assistantMessage('', [{ id: 'abc', toolName: 'lookup', arguments: {} }])];
    expect(() => normalizeBackendReply({ toolCalls: [{ id: 'abc', name: 'lookup', arguments: {} }] }, history)).toThrow(
      'tool call id "abc" was already used in this session'
    );
  });
});

describe('stripJsonFence', () => {
  it('removes json and bare fences', () => {
    expect(stripJsonFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripJsonFence('```\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripJsonFence('  {"a":1}  ')).toBe('{"a":1}');
  });
});
