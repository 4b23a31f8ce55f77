/**
 * Guardrail Registry
 *
 * Builds the checkpoint from configuration. A check is listed per stage, and
 * its position in the list is its evaluation order for that stage.
 */

import type { GuardrailSettings } from '../../core/config.js';
import { ConfigurationError } from '../../core/errors.js';
import { bindStages, GuardrailCheckpoint } from './checkpoint.js';
import { createCitationGroundednessCheck } from './checks/citation_groundedness.js';
import { createPromptInjectionCheck } from './checks/prompt_injection.js';
import { createRumorCorroborationCheck } from './checks/rumor_corroboration.js';
import { createSafetyClassifierCheck } from './checks/safety_classifier.js';
import { createSensitiveDataCheck } from './checks/sensitive_data.js';
import { createTopicFilterCheck } from './checks/topic_filter.js';
import { createTradeLimitsCheck } from './checks/trade_limits.js';
import type { GuardrailCheck, GuardrailStage, TextClassifier } from './types.js';

export interface GuardrailDependencies {
  classifier?: TextClassifier;
  /** Extra checks addressable by name from configuration. */
  extraChecks?: Record<string, GuardrailCheck>;
}

type CheckFactory = (settings: GuardrailSettings, deps: GuardrailDependencies) => GuardrailCheck;

const CHECK_FACTORIES: Record<string, CheckFactory> = {
  prompt_injection: () => createPromptInjectionCheck(),
  topic_filter: (settings) =>
    createTopicFilterCheck({ blockedPatterns: settings.topicFilter.blockedPatterns }),
  sensitive_data: () => createSensitiveDataCheck(),
  trade_limits: (settings) =>
    createTradeLimitsCheck({
      maxShares: settings.tradeLimits.maxShares,
      blockedTickers: settings.tradeLimits.blockedTickers,
    }),
  rumor_corroboration: (settings) =>
    createRumorCorroborationCheck({
      researchTool: settings.rumorCorroboration.researchTool,
      marketDataTool: settings.rumorCorroboration.marketDataTool,
      rumorPatterns: settings.rumorCorroboration.rumorPatterns,
    }),
  citation_groundedness: (settings) =>
    createCitationGroundednessCheck({ researchTool: settings.rumorCorroboration.researchTool }),
  safety_classifier: (_settings, deps) => {
    if (!deps.classifier) {
      throw new ConfigurationError('safety_classifier is configured but no classifier is available');
    }
    return createSafetyClassifierCheck(deps.classifier);
  },
};

export function listGuardrailChecks(): string[] {
  return Object.keys(CHECK_FACTORIES);
}

function resolveCheck(
  name: string,
  stage: GuardrailStage,
  settings: GuardrailSettings,
  deps: GuardrailDependencies
): GuardrailCheck {
  const extra = deps.extraChecks?.[name];
  const factory = CHECK_FACTORIES[name];
  const check = extra ?? (factory ? factory(settings, deps) : undefined);
  if (!check) {
    throw new ConfigurationError(
      `Unknown guardrail check "${name}". Available checks: ${listGuardrailChecks().join(', ')}`
    );
  }
  if (!check.stages.includes(stage)) {
    throw new ConfigurationError(`Guardrail check "${name}" does not support the ${stage} stage`);
  }
  return bindStages(check, [stage]);
}

export function buildGuardrails(
  settings: GuardrailSettings,
  deps: GuardrailDependencies = {}
): GuardrailCheckpoint {
  const plan: Array<[GuardrailStage, readonly string[]]> = [
    ['input', settings.input],
    ['pre_action', settings.preAction],
    ['output', settings.output],
  ];
  const checks = plan.flatMap(([stage, names]) =>
    names.map((name) => resolveCheck(name, stage, settings, deps))
  );
  return new GuardrailCheckpoint(checks);
}
