import type Database from 'better-sqlite3';
import { z } from 'zod';

import {
  assistantMessage,
  markUnreleased,
  systemNotice,
  toolResultMessage,
  userMessage,
} from '../agent/messages.js';
import type { AgentSession, Message, TerminalStatus } from '../agent/types.js';

export interface TranscriptSummary {
  id: string;
  goal: string;
  status: TerminalStatus;
  statusReason?: string;
  iterationCount: number;
  messageCount: number;
  createdAt: string;
}

export interface StoredTranscript extends TranscriptSummary {
  finalOutput?: string;
  history: Message[];
}

const StatusSchema = z.enum(['completed', 'blocked', 'iteration_limit_exceeded']);

const SummaryRowSchema = z.object({
  id: z.string(),
  goal: z.string(),
  status: StatusSchema,
  statusReason: z.string().nullable(),
  iterationCount: z.number().int(),
  messageCount: z.number().int(),
  createdAt: z.string(),
});

const SessionRowSchema = SummaryRowSchema.extend({
  finalOutput: z.string().nullable(),
});

const ToolCallsSchema = z.array(
  z.object({
    id: z.string(),
    toolName: z.string(),
    arguments: z.record(z.unknown()),
  })
);

const MessageRowSchema = z.object({
  role: z.enum(['user', 'assistant', 'tool_result', 'system_notice']),
  content: z.string(),
  toolCalls: z.string().nullable(),
  toolCallId: z.string().nullable(),
  released: z.number().int().nullable(),
});

type MessageRow = z.infer<typeof MessageRowSchema>;

const SUMMARY_COLUMNS = `
  s.id AS id,
  s.goal AS goal,
  s.status AS status,
  s.status_reason AS statusReason,
  s.iteration_count AS iterationCount,
  (SELECT COUNT(*) FROM session_messages m WHERE m.session_id = s.id) AS messageCount,
  s.created_at AS createdAt
`;

function restoreMessage(row: MessageRow): Message {
  switch (row.role) {
    case 'user':
      return userMessage(row.content);
    case 'system_notice':
      return systemNotice(row.content);
    case 'tool_result':
      return toolResultMessage(row.toolCallId ?? '', row.content);
    case 'assistant': {
      const calls = row.toolCalls ? ToolCallsSchema.parse(JSON.parse(row.toolCalls)) : [];
      const message = assistantMessage(row.content, calls);
      return row.released === 0 ? markUnreleased(message) : message;
    }
  }
}

function toSummary(row: z.infer<typeof SummaryRowSchema>): TranscriptSummary {
  return {
    id: row.id,
    goal: row.goal,
    status: row.status,
    statusReason: row.statusReason ?? undefined,
    iterationCount: row.iterationCount,
    messageCount: row.messageCount,
    createdAt: row.createdAt,
  };
}

/**
 * Persist a finished session with its full ordered history. Saving the same
 * session id again replaces the earlier copy.
 */
export function saveTranscript(
  db: Database.Database,
  session: AgentSession,
  createdAt: string = new Date().toISOString()
): void {
  const status = session.status;
  if (status === 'running') {
    throw new Error(`Session ${session.id} is still running and cannot be saved`);
  }

  const upsertSession = db.prepare(`
    INSERT OR REPLACE INTO sessions
      (id, goal, status, status_reason, final_output, iteration_count, created_at)
    VALUES (@id, @goal, @status, @statusReason, @finalOutput, @iterationCount, @createdAt)
  `);
  const clearMessages = db.prepare(`DELETE FROM session_messages WHERE session_id = ?`);
  const insertMessage = db.prepare(`
    INSERT INTO session_messages
      (session_id, position, role, content, tool_calls, tool_call_id, released)
    VALUES (@sessionId, @position, @role, @content, @toolCalls, @toolCallId, @released)
  `);

  const write = db.transaction(() => {
    clearMessages.run(session.id);
    upsertSession.run({
      id: session.id,
      goal: session.goal,
      status,
      statusReason: session.statusReason ?? null,
      finalOutput: session.finalOutput ?? null,
      iterationCount: session.iterationCount,
      createdAt,
    });
    session.history.forEach((message, position) => {
      insertMessage.run({
        sessionId: session.id,
        position,
        role: message.role,
        content: message.content,
        toolCalls: message.toolCalls.length > 0 ? JSON.stringify(message.toolCalls) : null,
        toolCallId: message.toolCallId ?? null,
        released: message.released === undefined ? null : Number(message.released),
      });
    });
  });
  write();
}

export function getTranscript(db: Database.Database, id: string): StoredTranscript | null {
  const row = db
    .prepare(`SELECT ${SUMMARY_COLUMNS}, s.final_output AS finalOutput FROM sessions s WHERE s.id = ?`)
    .get(id);
  if (row === undefined) return null;
  const session = SessionRowSchema.parse(row);

  const messages = db
    .prepare(
      `
        SELECT role, content, tool_calls AS toolCalls, tool_call_id AS toolCallId, released
        FROM session_messages
        WHERE session_id = ?
        ORDER BY position ASC
      `
    )
    .all(id);

  return {
    ...toSummary(session),
    finalOutput: session.finalOutput ?? undefined,
    history: z.array(MessageRowSchema).parse(messages).map(restoreMessage),
  };
}

/** Most recent first. */
export function listTranscripts(db: Database.Database, limit = 20): TranscriptSummary[] {
  const rows = db
    .prepare(`SELECT ${SUMMARY_COLUMNS} FROM sessions s ORDER BY s.created_at DESC, s.id ASC LIMIT ?`)
    .all(Math.max(1, Math.floor(limit)));
  return z.array(SummaryRowSchema).parse(rows).map(toSummary);
}
