/**
 * Error kinds raised across the agent loop.
 *
 * Only ConfigurationError (and its subclasses) is fatal: it surfaces before a
 * session starts. Every other kind is converted into an observation or a
 * terminal status by the state machine.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DuplicateToolError extends ConfigurationError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool "${toolName}" is already registered`);
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
  }
}

export class UnknownToolError extends Error {
  readonly toolName: string;

  constructor(toolName: string, available: string[]) {
    const list = available.length > 0 ? available.join(', ') : 'none';
    super(`Unknown tool "${toolName}". Available tools: ${list}`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class InvalidArgumentsError extends Error {
  readonly toolName: string;
  readonly fields: string[];

  constructor(toolName: string, fields: string[], details: string[]) {
    super(`Invalid arguments for "${toolName}": ${details.join('; ')}`);
    this.name = 'InvalidArgumentsError';
    this.toolName = toolName;
    this.fields = fields;
  }
}

export class ToolHandlerError extends Error {
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Tool "${toolName}" failed: ${detail}`, { cause });
    this.name = 'ToolHandlerError';
    this.toolName = toolName;
  }
}

/**
 * The oracle produced something that is neither a valid tool-call batch nor
 * final text. Transport failures and timeouts are reported with this kind too.
 */
export class MalformedDecisionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedDecisionError';
  }
}

export class VerdictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VerdictError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
