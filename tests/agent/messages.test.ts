import { describe, expect, it } from 'vitest';

import {
  assistantMessage,
  findToolCall,
  markUnreleased,
  snapshotHistory,
  systemNotice,
  toolResultMessage,
  userMessage,
  validateTranscript,
} from '../../src/agent/messages.js';

const lookup = (id: string) => ({ id, toolName: 'lookup', arguments: { ticker: 'NVDA' } });

describe('message constructors', () => {
  it('freezes messages and their tool calls', () => {
    const message = assistantMessage('', [lookup('c1')]);

    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.toolCalls)).toBe(true);
    expect(Object.isFrozen(message.toolCalls[0].arguments)).toBe(true);
  });

  it('copies a draft when marking it unreleased', () => {
    const draft = assistantMessage('Sell everything.');
    const withheld = markUnreleased(draft);

    expect(withheld).toEqual({ role: 'assistant', content: 'Sell everything.', toolCalls: [], released: false });
    expect(draft.released).toBeUndefined();
  });

  it('snapshots are frozen copies', () => {
    const history = [userMessage('goal')];
    const snapshot = snapshotHistory(history);
    history.push(systemNotice('later'));

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toHaveLength(1);
  });
});

describe('validateTranscript', () => {
  it('accepts a well-formed transcript', () => {
    const history = [
      userMessage('goal'),
      assistantMessage('', [lookup('c1'), lookup('c2')]),
      toolResultMessage('c1', 'one'),
      toolResultMessage('c2', 'two'),
      systemNotice('note'),
      assistantMessage('done'),
    ];
    expect(validateTranscript(history)).toEqual([]);
  });

  it('flags a result with no earlier request', () => {
    expect(validateTranscript([userMessage('goal'), toolResultMessage('c9', 'orphan')])).toEqual([
      { index: 1, problem: 'tool result c9 has no earlier request' },
    ]);
  });

  it('flags a call answered twice and a reused id', () => {
    const history = [
      assistantMessage('', [lookup('c1')]),
      toolResultMessage('c1', 'one'),
      toolResultMessage('c1', 'again'),
      assistantMessage('', [lookup('c1')]),
    ];
    expect(validateTranscript(history)).toEqual([
      { index: 2, problem: 'tool call c1 answered more than once' },
      { index: 3, problem: 'tool call id c1 reused' },
    ]);
  });

  it('flags a result without an id', () => {
    expect(validateTranscript([toolResultMessage('', 'text')])).toEqual([
      { index: 0, problem: 'tool result without tool call id' },
    ]);
  });
});

describe('findToolCall', () => {
  it('finds the request a result answers', () => {
    const history = [assistantMessage('', [lookup('c1'), lookup('c2')])];
    expect(findToolCall(history, 'c2')).toEqual(lookup('c2'));
    expect(findToolCall(history, 'c3')).toBeUndefined();
  });
});
