import type { Logger } from '../../core/logger.js';
import type { StateMachineObserver } from './state_machine.js';

/**
 * Observer that writes the run to a Logger: transitions at debug, dispatches
 * at info, blocks and rewrites at warn.
 */
export function createLoggingObserver(logger: Logger): StateMachineObserver {
  return {
    onTransition: ({ sessionId, from, to, iteration }) => {
      logger.debug(`[${sessionId}] ${from} -> ${to}`, { iteration });
    },
    onVerdict: ({ sessionId, stage, verdict, toolCall }) => {
      if (verdict.decision === 'allow') return;
      const target = toolCall ? ` ${toolCall.toolName} (${toolCall.id})` : '';
      const check = verdict.checkName ? ` [${verdict.checkName}]` : '';
      logger.warn(`[${sessionId}] ${stage}${target} ${verdict.decision}${check}: ${verdict.reason}`);
    },
    onDispatch: (result, sessionId) => {
      const line = `[${sessionId}] ${result.toolName} (${result.toolCallId}) ${result.outcome} in ${result.durationMs}ms`;
      if (result.outcome === 'ok') logger.info(line);
      else logger.warn(line);
    },
  };
}
