import { describe, it, expect } from 'vitest';
import { parseAgentConfig } from './config-loader.js';
import { MAX_AGENT_WEIGHT } from '../config/schema.js';
import { ConfigurationError } from '../monitoring/errors.js';

function expectConfigurationError(source: string): ConfigurationError {
  try {
    parseAgentConfig(source);
  } catch (error) {
    expect(error).toBeInstanceOf(ConfigurationError);
    if (error instanceof ConfigurationError) {
      return error;
    }
  }
  throw new Error('expected parseAgentConfig to throw');
}

describe('parseAgentConfig', () => {
  it('should parse models and agents in document order', () => {
    const config = parseAgentConfig(`
models:
  gpt-4o:
    enabled: true
    capacity: 50
  gpt-4.1-mini:
    enabled: false
agents:
  - name: a1
    model: gpt-4o
    weight: 90
    enabled: true
    external_id: asst_a1
  - name: a2
    model: gpt-4.1-mini
    weight: 10
    enabled: false
    external_id: asst_a2
`);

    expect(config.models).toEqual([
      { name: 'gpt-4o', enabled: true, capacity: 50 },
      { name: 'gpt-4.1-mini', enabled: false, capacity: undefined },
    ]);
    expect(config.agents).toEqual([
      { name: 'a1', model: 'gpt-4o', weight: 90, enabled: true, externalId: 'asst_a1' },
      { name: 'a2', model: 'gpt-4.1-mini', weight: 10, enabled: false, externalId: 'asst_a2' },
    ]);
  });

  it('should ignore extra keys on agents', () => {
    const config = parseAgentConfig(`
models:
  gpt-4o: {}
agents:
  - name: a1
    model: gpt-4o
    weight: 5
    temperature: 0.3
    tools: [bing_grounding]
    instructions: Be brief.
`);

    expect(config.agents[0]).toEqual({
      name: 'a1',
      model: 'gpt-4o',
      weight: 5,
      enabled: true,
      externalId: '',
    });
  });

  it('should apply defaults to agents that omit weight or enabled', () => {
    const config = parseAgentConfig(`
defaults:
  weight: 100
  enabled: false
models:
  gpt-4o:
agents:
  - name: a1
    model: gpt-4o
  - name: a2
    model: gpt-4o
    weight: 3
    enabled: true
`);

    expect(config.models).toEqual([{ name: 'gpt-4o', enabled: true, capacity: undefined }]);
    expect(config.agents.map((agent) => [agent.name, agent.weight, agent.enabled])).toEqual([
      ['a1', 100, false],
      ['a2', 3, true],
    ]);
  });

  it('should treat an omitted weight as zero without a defaults block', () => {
    const config = parseAgentConfig(`
models:
  gpt-4o: {}
agents:
  - name: a1
    model: gpt-4o
`);

    expect(config.agents[0]?.weight).toBe(0);
    expect(config.agents[0]?.enabled).toBe(true);
  });

  it('should accept an empty document', () => {
    expect(parseAgentConfig('')).toEqual({ models: [], agents: [] });
  });

  it('should reject duplicate agent names across models', () => {
    const error = expectConfigurationError(`
models:
  gpt-4o: {}
  gpt-4.1-mini: {}
agents:
  - name: a1
    model: gpt-4o
    weight: 1
  - name: a1
    model: gpt-4.1-mini
    weight: 1
`);

    expect(error.issues).toEqual(["agents.1: duplicate agent name 'a1'"]);
  });

  it('should reject agents referencing an unknown model', () => {
    const error = expectConfigurationError(`
models:
  gpt-4o: {}
agents:
  - name: a1
    model: gpt-5
    weight: 1
`);

    expect(error.issues).toEqual(["agents.0: agent 'a1' references unknown model 'gpt-5'"]);
  });

  it('should report every problem at once', () => {
    const error = expectConfigurationError(`
models:
  gpt-4o: {}
agents:
  - name: a1
    model: gpt-4o
  - name: a1
    model: gpt-5
`);

    expect(error.issues).toEqual([
      "agents.1: duplicate agent name 'a1'",
      "agents.1: agent 'a1' references unknown model 'gpt-5'",
    ]);
  });

  it('should reject negative or fractional weights', () => {
    const error = expectConfigurationError(`
models:
  gpt-4o: {}
agents:
  - name: a1
    model: gpt-4o
    weight: -1
  - name: a2
    model: gpt-4o
    weight: 1.5
`);

    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^agents\.0\.weight: /);
    expect(error.issues[1]).toMatch(/^agents\.1\.weight: /);
  });

  it('should reject weights above the cap, in agents and in defaults', () => {
    const error = expectConfigurationError(`
defaults:
  weight: 2000000
models:
  m: {}
agents:
  - { name: a1, model: m, weight: 1e308 }
  - { name: a2, model: m, weight: 18014398509481984 }
`);

    expect(error.issues).toHaveLength(3);
    expect(error.issues[0]).toMatch(/^defaults\.weight: /);
    expect(error.issues[1]).toMatch(/^agents\.0\.weight: /);
    expect(error.issues[2]).toMatch(/^agents\.1\.weight: /);
  });

  it('should accept a weight at the cap', () => {
    const config = parseAgentConfig(`
models:
  m: {}
agents:
  - { name: a1, model: m, weight: ${MAX_AGENT_WEIGHT} }
  - { name: a2, model: m, weight: 1 }
`);

    expect(config.agents.map((agent) => agent.weight)).toEqual([1_000_000, 1]);
  });

  it('should reject agents without a name', () => {
    const error = expectConfigurationError(`
models:
  gpt-4o: {}
agents:
  - model: gpt-4o
`);

    expect(error.issues[0]).toMatch(/^agents\.0\.name: /);
  });

  it('should wrap YAML syntax errors', () => {
    const error = expectConfigurationError('agents: [\n  - name: a1\n');

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^Failed to parse YAML: /);
    expect(error.statusCode).toBe(422);
  });
});
