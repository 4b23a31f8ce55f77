#!/usr/bin/env node
/**
 * guarded-agent CLI
 *
 * Runs one guarded session for a goal and prints the transcript.
 */

import 'dotenv/config';

import { Command, InvalidArgumentError } from 'commander';
import yaml from 'yaml';

import { VERSION } from '../index.js';
import { listGuardrailChecks } from '../agent/guardrails/registry.js';
import { loadScriptedOracle } from '../agent/oracle/scripted.js';
import type { SessionResult } from '../agent/session_driver.js';
import { GuardedAgent } from '../core/agent.js';
import { loadConfig, redactConfig } from '../core/config.js';
import { ConfigurationError, describeError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { openDatabase } from '../memory/db.js';
import { getTranscript, listTranscripts } from '../memory/transcripts.js';
import { exitCodeFor, formatSummaryLine, formatTranscript } from './format.js';

const CONFIG_ERROR_EXIT_CODE = 1;

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

interface RunCommandOptions {
  config?: string;
  maxIterations?: number;
  script?: string;
  json?: boolean;
  save?: boolean;
  verbose?: boolean;
}

interface TranscriptsCommandOptions {
  config?: string;
  limit: number;
}

const program = new Command();

program
  .name('guarded-agent')
  .description('Tool-using research and paper-trading agent with input, pre-action and output guardrails')
  .version(VERSION);

// ============================================================================
// Run
// ============================================================================

program
  .command('run')
  .description('Run one session for a goal and print the transcript')
  .argument('<goal>', 'What the agent should accomplish')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('-m, --max-iterations <n>', 'Override agent.maxIterations', parsePositiveInt)
  .option('-s, --script <file>', 'Replay oracle replies from a JSON file instead of calling the backend')
  .option('--json', 'Print the result as JSON')
  .option('--save', 'Store the transcript in the audit database')
  .option('-v, --verbose', 'Debug logging')
  .action(async (goal: string, options: RunCommandOptions) => {
    const config = loadConfig(options.config);
    if (options.maxIterations !== undefined) {
      config.agent.maxIterations = options.maxIterations;
    }
    const logger = new Logger(options.verbose ? 'debug' : config.logging.level, {
      filePath: config.logging.file,
    });

    try {
      const agent = new GuardedAgent(config, {
        logger,
        oracle: options.script ? loadScriptedOracle(options.script) : undefined,
      });

      const controller = new AbortController();
      const onSigint = () => {
        logger.warn('Cancellation requested; finishing the current step');
        controller.abort();
      };
      process.once('SIGINT', onSigint);

      let result: SessionResult;
      try {
        result = await agent.run(goal, {
          signal: controller.signal,
          persist: options.save ? true : undefined,
        });
      } finally {
        process.off('SIGINT', onSigint);
      }

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              sessionId: result.session.id,
              status: result.status,
              reason: result.reason ?? null,
              finalOutput: result.finalOutput ?? null,
              iterations: result.session.iterationCount,
              history: result.history,
            },
            null,
            2
          )
        );
      } else {
        console.log(formatTranscript(result.history));
        console.log('─'.repeat(40));
        console.log(`Status: ${result.status}`);
        if (result.reason) console.log(`Reason: ${result.reason}`);
        console.log(`Iterations: ${result.session.iterationCount}/${config.agent.maxIterations}`);
        if (result.finalOutput !== undefined) {
          console.log('');
          console.log(result.finalOutput);
        }
      }
      process.exitCode = exitCodeFor(result.status);
    } finally {
      logger.close();
    }
  });

// ============================================================================
// Config
// ============================================================================

program
  .command('config')
  .description('Print the effective configuration (API key redacted)')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('--checks', 'List the guardrail checks that can be named in guardrails.*')
  .action(async (options: { config?: string; checks?: boolean }) => {
    if (options.checks) {
      for (const name of listGuardrailChecks()) console.log(name);
      return;
    }
    console.log(yaml.stringify(redactConfig(loadConfig(options.config))));
  });

// ============================================================================
// Transcripts
// ============================================================================

program
  .command('transcripts')
  .description('List stored transcripts, or print one by id')
  .argument('[id]', 'Session id')
  .option('-c, --config <path>', 'Path to config.yaml')
  .option('-l, --limit <n>', 'Number of transcripts to list', parsePositiveInt, 20)
  .action(async (id: string | undefined, options: TranscriptsCommandOptions) => {
    const config = loadConfig(options.config);
    const db = openDatabase(config.memory.dbPath);

    if (id) {
      const transcript = getTranscript(db, id);
      if (!transcript) {
        console.log(`No transcript with id ${id}.`);
        process.exitCode = 1;
        return;
      }
      console.log(formatSummaryLine(transcript));
      console.log('─'.repeat(60));
      console.log(formatTranscript(transcript.history));
      return;
    }

    const summaries = listTranscripts(db, options.limit);
    if (summaries.length === 0) {
      console.log('No transcripts stored.');
      return;
    }
    console.log('Transcripts');
    console.log('─'.repeat(60));
    for (const summary of summaries) {
      console.log(formatSummaryLine(summary));
    }
  });

// ============================================================================
// Parse and Run
// ============================================================================

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`Configuration error: ${err.message}`);
  } else {
    console.error(`Error: ${describeError(err)}`);
  }
  process.exitCode = CONFIG_ERROR_EXIT_CODE;
});
