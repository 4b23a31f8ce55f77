import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { ToolRegistry, toInvalidArgumentsError } from '../../src/agent/tools/registry.js';
import { defineTool } from '../../src/agent/tools/types.js';
import { ConfigurationError, DuplicateToolError } from '../../src/core/errors.js';
import { recordingTool } from './helpers.js';

describe('ToolRegistry', () => {
  it('rejects a second tool with the same name', () => {
    const registry = new ToolRegistry().register(recordingTool('lookup', 'read_only').definition);

    expect(() => registry.register(recordingTool('lookup', 'side_effecting').definition)).toThrow(
      DuplicateToolError
    );
    expect(() => registry.register(recordingTool('lookup', 'read_only').definition)).toThrow(
      ConfigurationError
    );
    expect(registry.listNames()).toEqual(['lookup']);
  });

  it('describes registered tools without exposing handlers', () => {
    const registry = new ToolRegistry().register(recordingTool('trade', 'side_effecting').definition);

    expect(registry.get('trade')).toEqual({
      name: 'trade',
      description: 'test tool trade',
      category: 'system',
      riskLevel: 'side_effecting',
    });
    expect(registry.get('missing')).toBeUndefined();
    expect(registry.has('trade')).toBe(true);
  });

  it('compiles zod schemas into JSON Schema for the model', () => {
    const registry = new ToolRegistry().register(recordingTool('lookup', 'read_only').definition);

    const [schema] = registry.getLlmSchemas();
    expect(schema.name).toBe('lookup');
    expect(schema.description).toBe('test tool lookup');
    expect(schema.parameters.type).toBe('object');
    expect(schema.parameters.required).toEqual(['ticker']);
    expect(schema.parameters.properties).toEqual({ ticker: { type: 'string' } });
    expect('$schema' in schema.parameters).toBe(false);
  });

  it('reports an unknown tool with the list of available tools', async () => {
    const registry = new ToolRegistry()
      .register(recordingTool('lookup', 'read_only').definition)
      .register(recordingTool('trade', 'side_effecting').definition);

    const result = await registry.dispatch(
      { id: 'call_1', toolName: 'teleport', arguments: {} },
      { sessionId: 's1' }
    );

    expect(result.outcome).toBe('unknown_tool');
    expect(result.toolCallId).toBe('call_1');
    expect(result.content).toBe(
      'ERROR (UnknownToolError): Unknown tool "teleport". Available tools: lookup, trade'
    );
  });

  it('names the offending field when arguments fail validation', async () => {
    const tool = recordingTool('lookup', 'read_only');
    const registry = new ToolRegistry().register(tool.definition);

    const missing = await registry.dispatch(
      { id: 'call_1', toolName: 'lookup', arguments: {} },
      { sessionId: 's1' }
    );
    const wrongType = await registry.dispatch(
      { id: 'call_2', toolName: 'lookup', arguments: { ticker: 42 } },
      { sessionId: 's1' }
    );

    expect(missing.outcome).toBe('invalid_arguments');
    expect(missing.content).toBe('ERROR (InvalidArgumentsError): Invalid arguments for "lookup": ticker: Required');
    expect(wrongType.content).toBe(
      'ERROR (InvalidArgumentsError): Invalid arguments for "lookup": ticker: Expected string, received number'
    );
    expect(tool.calls).toHaveLength(0);
  });

  it('collects every invalid field', () => {
    const schema = z.object({ ticker: z.string(), quantity: z.number() });
    const parsed = schema.safeParse({ quantity: 'ten' });
    if (parsed.success) throw new Error('expected validation to fail');

    const error = toInvalidArgumentsError('trade', parsed.error);
    expect(error.fields).toEqual(['ticker', 'quantity']);
    expect(error.toolName).toBe('trade');
  });

  it('turns a handler failure into an observation', async () => {
    const registry = new ToolRegistry().register(
      defineTool({
        name: 'flaky',
        description: 'always fails',
        category: 'system',
        riskLevel: 'read_only',
        schema: z.object({}),
        execute: async () => {
          throw new Error('feed offline');
        },
      })
    );

    const result = await registry.dispatch(
      { id: 'call_9', toolName: 'flaky', arguments: {} },
      { sessionId: 's1' }
    );

    expect(result.outcome).toBe('handler_failed');
    expect(result.content).toBe('ERROR (ToolHandlerError): Tool "flaky" failed: feed offline');
  });

  it('JSON-encodes structured output and passes the call context', async () => {
    const seen: Array<{ sessionId: string; toolCallId: string }> = [];
    const registry = new ToolRegistry().register(
      defineTool({
        name: 'quote',
        description: 'quote',
        category: 'market',
        riskLevel: 'read_only',
        schema: z.object({ ticker: z.string() }),
        execute: async ({ ticker }, ctx) => {
          seen.push(ctx);
          return { ticker, price: 10 };
        },
      })
    );

    const result = await registry.dispatch(
      { id: 'call_3', toolName: 'quote', arguments: { ticker: 'ABC' } },
      { sessionId: 'session-7' }
    );

    expect(result.outcome).toBe('ok');
    expect(result.content).toBe('{"ticker":"ABC","price":10}');
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(seen).toEqual([{ sessionId: 'session-7', toolCallId: 'call_3' }]);
  });
});
