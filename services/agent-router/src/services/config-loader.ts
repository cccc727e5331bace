import { parse as parseYaml } from 'yaml';
import { agentConfigDocumentSchema, formatIssues } from '../config/schema.js';
import { ConfigurationError, errorMessage } from '../monitoring/errors.js';
import { Agent, AgentDefaults, ModelDefinition } from '../types/index.js';

export interface ParsedAgentConfig {
  models: ModelDefinition[];
  agents: Agent[];
}

// Applied when the document has no `defaults` block
const BUILTIN_DEFAULTS: AgentDefaults = {
  weight: 0,
  enabled: true,
};

/**
 * Parse and validate an agent configuration document.
 * Throws ConfigurationError listing every problem found; never returns a partial result.
 */
export function parseAgentConfig(source: string): ParsedAgentConfig {
  let raw: unknown;
  try {
    raw = parseYaml(source);
  } catch (error) {
    throw new ConfigurationError([`Failed to parse YAML: ${errorMessage(error)}`]);
  }

  const parsed = agentConfigDocumentSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error));
  }

  const document = parsed.data;
  const defaults: AgentDefaults = {
    weight: document.defaults?.weight ?? BUILTIN_DEFAULTS.weight,
    enabled: document.defaults?.enabled ?? BUILTIN_DEFAULTS.enabled,
  };

  const models: ModelDefinition[] = Object.entries(document.models).map(([name, entry]) => ({
    name,
    enabled: entry?.enabled ?? true,
    capacity: entry?.capacity,
  }));
  const knownModels = new Set(models.map((model) => model.name));

  const issues: string[] = [];
  const seen = new Set<string>();
  const agents: Agent[] = [];

  document.agents.forEach((entry, index) => {
    if (seen.has(entry.name)) {
      issues.push(`agents.${index}: duplicate agent name '${entry.name}'`);
    }
    seen.add(entry.name);

    if (!knownModels.has(entry.model)) {
      issues.push(`agents.${index}: agent '${entry.name}' references unknown model '${entry.model}'`);
    }

    agents.push({
      name: entry.name,
      model: entry.model,
      weight: entry.weight ?? defaults.weight,
      enabled: entry.enabled ?? defaults.enabled,
      externalId: entry.external_id ?? '',
    });
  });

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return { models, agents };
}
