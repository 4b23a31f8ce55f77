import { randomUUID } from 'node:crypto';

import { ConfigurationError } from '../../core/errors.js';
import { userMessage } from '../messages.js';
import type { AgentSession, SessionStatus, TerminalStatus } from '../types.js';

export interface CreateSessionOptions {
  /** Fixed id, mainly for replaying a session deterministically. */
  id?: string;
}

/**
 * New running session seeded with the caller's goal as its only message.
 */
export function createSession(goal: string, options: CreateSessionOptions = {}): AgentSession {
  if (!goal.trim()) {
    throw new ConfigurationError('A session needs a non-empty goal');
  }
  return {
    id: options.id ?? randomUUID(),
    goal,
    history: [userMessage(goal)],
    iterationCount: 0,
    status: 'running',
  };
}

export type ClosedSession = AgentSession & { status: TerminalStatus };

function isTerminal(status: SessionStatus): status is TerminalStatus {
  return status !== 'running';
}

export function isClosed(session: AgentSession): session is ClosedSession {
  return isTerminal(session.status);
}

/**
 * Record the terminal status and freeze the session and its history.
 */
export function closeSession(
  session: AgentSession,
  status: TerminalStatus,
  details: { reason?: string; finalOutput?: string } = {}
): ClosedSession {
  if (details.reason !== undefined) session.statusReason = details.reason;
  if (details.finalOutput !== undefined) session.finalOutput = details.finalOutput;
  const closed = Object.assign(session, { status });
  Object.freeze(closed.history);
  return Object.freeze(closed);
}
