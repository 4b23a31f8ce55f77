import type { HistorySnapshot, Message, TerminalStatus } from '../agent/types.js';
import type { TranscriptSummary } from '../memory/transcripts.js';

function label(message: Message): string {
  switch (message.role) {
    case 'tool_result':
      return `tool_result ${message.toolCallId ?? '?'}`;
    case 'assistant':
      return message.released === false ? 'assistant, not released' : 'assistant';
    default:
      return message.role;
  }
}

export function formatMessage(message: Message): string[] {
  const lines: string[] = [];
  if (message.content || message.toolCalls.length === 0) {
    lines.push(`[${label(message)}] ${message.content}`);
  } else {
    lines.push(`[${label(message)}]`);
  }
  for (const call of message.toolCalls) {
    lines.push(`  -> ${call.id} ${call.toolName} ${JSON.stringify(call.arguments)}`);
  }
  return lines;
}

export function formatTranscript(history: HistorySnapshot): string {
  return history.flatMap(formatMessage).join('\n');
}

export function formatSummaryLine(summary: TranscriptSummary): string {
  const reason = summary.statusReason ? ` (${summary.statusReason})` : '';
  return `${summary.createdAt} | ${summary.id} | ${summary.status}${reason} | ${summary.messageCount} msg | ${summary.goal}`;
}

const EXIT_CODES: Record<TerminalStatus, number> = {
  completed: 0,
  blocked: 2,
  iteration_limit_exceeded: 3,
};

export function exitCodeFor(status: TerminalStatus): number {
  return EXIT_CODES[status];
}
