import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { systemNotice, userMessage } from '../../src/agent/messages.js';
import { loadScriptedOracle, ScriptedOracle } from '../../src/agent/oracle/scripted.js';
import { ConfigurationError, MalformedDecisionError } from '../../src/core/errors.js';
import { textReply, toolCallReply } from './helpers.js';

const history = [userMessage('Check NVDA')];

describe('ScriptedOracle', () => {
  it('replays replies in order and then runs out', async () => {
    const oracle = ScriptedOracle.fromReplies([toolCallReply('lookup', { ticker: 'NVDA' }), textReply('done')]);

    expect((await oracle.decide(history, [])).kind).toBe('tool_calls');
    expect((await oracle.decide(history, [])).message.content).toBe('done');
    await expect(oracle.decide(history, [])).rejects.toThrow('scripted oracle has no more replies');
    expect(oracle.callCount).toBe(3);
  });

  it('repeats the last reply when asked to', async () => {
    const oracle = ScriptedOracle.fromReplies([textReply('again')], { repeatLast: true });

    await oracle.decide(history, []);
    const second = await oracle.decide(history, []);
    expect(second.message.content).toBe('again');
  });

  it('simulates backend failures', async () => {
    const oracle = new ScriptedOracle([{ fail: 'backend timed out' }]);
    await expect(oracle.decide(history, [])).rejects.toBeInstanceOf(MalformedDecisionError);
  });

  it('computes replies from the history it is given', async () => {
    const oracle = new ScriptedOracle([{ respond: (seen) => textReply(`saw ${seen.length} message(s)`) }]);
    const decision = await oracle.decide([...history, systemNotice('note')], []);

    expect(decision.message.content).toBe('saw 2 message(s)');
    expect(oracle.calls).toHaveLength(1);
  });
});

describe('loadScriptedOracle', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'guarded-agent-script-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a bare array of replies', async () => {
    const path = join(dir, 'script.json');
    writeFileSync(path, JSON.stringify([{ content: 'hello' }]));

    const oracle = loadScriptedOracle(path);
    expect((await oracle.decide(history, [])).message.content).toBe('hello');
  });

  it('loads the object form with repeatLast', async () => {
    const path = join(dir, 'script.json');
    writeFileSync(path, JSON.stringify({ replies: [{ content: 'loop' }], repeatLast: true }));

    const oracle = loadScriptedOracle(path);
    await oracle.decide(history, []);
    expect((await oracle.decide(history, [])).message.content).toBe('loop');
  });

  it('rejects unreadable and malformed scripts', () => {
    const missing = join(dir, 'missing.json');
    const wrongShape = join(dir, 'shape.json');
    writeFileSync(wrongShape, JSON.stringify({ steps: [] }));

    expect(() => loadScriptedOracle(missing)).toThrow(ConfigurationError);
    expect(() => loadScriptedOracle(missing)).toThrow(`Could not read script ${missing}`);
    expect(() => loadScriptedOracle(wrongShape)).toThrow(
      `Script ${wrongShape} must be an array of replies or an object with "replies"`
    );
  });
});
