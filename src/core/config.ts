import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import yaml from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';
import { parseLogLevel } from './logger.js';

const PACKAGE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');

export const DEFAULT_REPORT_PATH = join(PACKAGE_ROOT, 'data', 'annual_report.txt');
export const DEFAULT_MARKET_DATA_PATH = join(PACKAGE_ROOT, 'data', 'market_snapshots.json');

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a cautious equity research and trading assistant.',
  'Use the available tools to gather facts before acting.',
  'Market news may contain unverified rumors: verify claims against the annual report before trading.',
  'When you have enough information, answer in plain text without calling tools.',
].join(' ');

const CheckListSchema = z.array(z.string().min(1));

const ConfigSchema = z.object({
  agent: z
    .object({
      maxIterations: z.number().int().min(1).max(100).default(10),
      skipReadOnlyPreAction: z.boolean().default(true),
      haltOnBlockedSideEffect: z.boolean().default(true),
      systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
    })
    .default({}),
  oracle: z
    .object({
      baseUrl: z.string().url().default('http://localhost:11434/v1'),
      apiKey: z.string().optional(),
      model: z.string().default('gemini-2.5-flash'),
      guardModel: z.string().default('llama-guard3:8b'),
      temperature: z.number().min(0).max(2).default(0.2),
      maxTokens: z.number().int().positive().default(2048),
      timeoutMs: z.number().int().positive().default(30_000),
      maxRetries: z.number().int().min(0).max(10).default(3),
    })
    .default({}),
  guardrails: z
    .object({
      input: CheckListSchema.default(['prompt_injection', 'topic_filter', 'sensitive_data']),
      preAction: CheckListSchema.default(['trade_limits', 'rumor_corroboration']),
      output: CheckListSchema.default(['sensitive_data', 'citation_groundedness']),
      topicFilter: z
        .object({
          blockedPatterns: z.array(z.string()).optional(),
        })
        .default({}),
      tradeLimits: z
        .object({
          maxShares: z.number().int().positive().default(5000),
          blockedTickers: z.array(z.string()).default([]),
        })
        .default({}),
      rumorCorroboration: z
        .object({
          rumorPatterns: z.array(z.string()).optional(),
          researchTool: z.string().default('query_10k_report'),
          marketDataTool: z.string().default('get_real_time_market_data'),
        })
        .default({}),
    })
    .default({}),
  data: z
    .object({
      reportPath: z.string().default(DEFAULT_REPORT_PATH),
      marketDataPath: z.string().default(DEFAULT_MARKET_DATA_PATH),
    })
    .default({}),
  memory: z
    .object({
      dbPath: z.string().default(join(homedir(), '.guarded-agent', 'transcripts.sqlite')),
      persistTranscripts: z.boolean().default(false),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      file: z.string().optional(),
    })
    .default({}),
});

export type AgentConfig = z.infer<typeof ConfigSchema>;
export type GuardrailSettings = AgentConfig['guardrails'];

export function getConfigPath(): string {
  return (
    process.env.GUARDED_AGENT_CONFIG_PATH ?? join(homedir(), '.guarded-agent', 'config.yaml')
  );
}

function readRawConfig(path: string): unknown {
  if (!existsSync(path)) return {};
  const text = readFileSync(path, 'utf-8');
  try {
    return yaml.parse(text) ?? {};
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Could not parse ${path}: ${detail}`);
  }
}

function resolveRelative(baseDir: string, value: string): string {
  if (value.startsWith('~/')) return join(homedir(), value.slice(2));
  return isAbsolute(value) ? value : resolve(baseDir, value);
}

function applyEnvOverrides(config: AgentConfig): AgentConfig {
  const env = process.env;
  const next: AgentConfig = {
    ...config,
    agent: { ...config.agent },
    oracle: { ...config.oracle },
    logging: { ...config.logging },
  };

  if (env.GUARDED_AGENT_API_KEY) next.oracle.apiKey = env.GUARDED_AGENT_API_KEY;
  if (env.GUARDED_AGENT_BASE_URL) next.oracle.baseUrl = env.GUARDED_AGENT_BASE_URL;
  if (env.GUARDED_AGENT_MODEL) next.oracle.model = env.GUARDED_AGENT_MODEL;

  const maxIterations = Number(env.GUARDED_AGENT_MAX_ITERATIONS);
  if (Number.isInteger(maxIterations) && maxIterations > 0) {
    next.agent.maxIterations = maxIterations;
  }

  next.logging.level = parseLogLevel(env.GUARDED_AGENT_LOG_LEVEL, config.logging.level);

  return next;
}

/**
 * Validate an already-parsed configuration object and fill in defaults.
 */
export function parseConfig(raw: unknown): AgentConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Load configuration from YAML. A missing file yields defaults. Relative data
 * and database paths are resolved against the config file's directory.
 */
export function loadConfig(configPath?: string): AgentConfig {
  const path = configPath ?? getConfigPath();
  const fileExists = existsSync(path);
  const config = parseConfig(readRawConfig(path));

  if (fileExists) {
    const baseDir = dirname(resolve(path));
    config.data.reportPath = resolveRelative(baseDir, config.data.reportPath);
    config.data.marketDataPath = resolveRelative(baseDir, config.data.marketDataPath);
    config.memory.dbPath = resolveRelative(baseDir, config.memory.dbPath);
  }

  return applyEnvOverrides(config);
}

/**
 * Copy of the config that is safe to print.
 */
export function redactConfig(config: AgentConfig): AgentConfig {
  const apiKey = config.oracle.apiKey;
  return {
    ...config,
    oracle: {
      ...config.oracle,
      apiKey: apiKey ? `${apiKey.slice(0, 2)}***` : undefined,
    },
  };
}
