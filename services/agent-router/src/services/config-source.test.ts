import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileConfigSource, MemoryConfigSource, setAgentWeight } from './config-source.js';
import { parseAgentConfig } from './config-loader.js';
import { AgentNotFoundError, ConfigurationError } from '../monitoring/errors.js';

const DOCUMENT = `# rollout config
models:
  gpt-4o: {}
agents:
  - name: a1
    model: gpt-4o
    weight: 90 # primary
    temperature: 0.2
  - name: a2
    model: gpt-4o
`;

describe('setAgentWeight', () => {
  it('should change only the named agent and keep comments', () => {
    const updated = setAgentWeight(DOCUMENT, 'a1', 40);

    expect(updated).toContain('# rollout config');
    expect(updated).toContain('weight: 40 # primary');
    expect(updated).toContain('temperature: 0.2');
    expect(parseAgentConfig(updated).agents.map((agent) => [agent.name, agent.weight])).toEqual([
      ['a1', 40],
      ['a2', 0],
    ]);
  });

  it('should add a weight to an agent that had none', () => {
    const updated = setAgentWeight(DOCUMENT, 'a2', 7);

    expect(parseAgentConfig(updated).agents.map((agent) => [agent.name, agent.weight])).toEqual([
      ['a1', 90],
      ['a2', 7],
    ]);
  });

  it('should throw AgentNotFoundError listing the known agents', () => {
    try {
      setAgentWeight(DOCUMENT, 'ghost', 1);
      expect.unreachable('setAgentWeight should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(AgentNotFoundError);
      if (error instanceof AgentNotFoundError) {
        expect(error.details).toEqual({ agent: 'ghost', available: ['a1', 'a2'] });
        expect(error.statusCode).toBe(404);
      }
    }
  });

  it('should throw AgentNotFoundError when there is no agents sequence', () => {
    expect(() => setAgentWeight('models: {}\n', 'a1', 1)).toThrow(AgentNotFoundError);
  });

  it('should refuse to edit a document that does not parse', () => {
    expect(() => setAgentWeight('agents: [\n', 'a1', 1)).toThrow(ConfigurationError);
  });
});

describe('MemoryConfigSource', () => {
  it('should return the edited document on the next read', async () => {
    const source = new MemoryConfigSource(DOCUMENT);

    await source.updateAgentWeight('a1', 5);

    expect(parseAgentConfig(await source.read()).agents[0]?.weight).toBe(5);
  });
});

describe('FileConfigSource', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'agent-router-'));
    path = join(dir, 'agents.yaml');
    await writeFile(path, DOCUMENT, 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read the file as-is', async () => {
    const source = new FileConfigSource(path);

    expect(await source.read()).toBe(DOCUMENT);
    expect(source.description).toBe(`file:${path}`);
  });

  it('should write weight edits back to the file', async () => {
    const source = new FileConfigSource(path);

    await source.updateAgentWeight('a1', 0);

    const written = await readFile(path, 'utf-8');
    expect(written).toContain('weight: 0 # primary');
    expect(written.startsWith('# rollout config\n')).toBe(true);
  });

  it('should keep every edit when several arrive at once', async () => {
    const source = new FileConfigSource(path);

    const results = await Promise.allSettled([
      source.updateAgentWeight('a1', 5),
      source.updateAgentWeight('a2', 7),
      source.updateAgentWeight('ghost', 1),
      source.updateAgentWeight('a1', 6),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled', 'rejected', 'fulfilled']);
    const written = parseAgentConfig(await readFile(path, 'utf-8'));
    expect(written.agents.map((agent) => [agent.name, agent.weight])).toEqual([
      ['a1', 6],
      ['a2', 7],
    ]);
    expect((await readdir(dir)).sort()).toEqual(['agents.yaml']);
  });

  it('should leave the file untouched when the agent is unknown', async () => {
    const source = new FileConfigSource(path);

    await expect(source.updateAgentWeight('ghost', 3)).rejects.toBeInstanceOf(AgentNotFoundError);
    expect(await readFile(path, 'utf-8')).toBe(DOCUMENT);
  });
});
