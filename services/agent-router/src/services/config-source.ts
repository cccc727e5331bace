import { readFile, writeFile, rename } from 'node:fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { isMap, isScalar, isSeq, parseDocument } from 'yaml';
import { AgentNotFoundError, ConfigurationError } from '../monitoring/errors.js';

/**
 * Where agent configuration comes from. The router only reads it, except for
 * operator weight edits, which land here and take effect on the next refresh.
 */
export interface ConfigSource {
  readonly description: string;
  read(): Promise<string>;
  updateAgentWeight(name: string, weight: number): Promise<void>;
}

/**
 * Set `weight` on the named agent in a YAML document, keeping comments and every other key.
 */
export function setAgentWeight(source: string, name: string, weight: number): string {
  const document = parseDocument(source);
  if (document.errors.length > 0) {
    throw new ConfigurationError(document.errors.map((error) => `Failed to parse YAML: ${error.message}`));
  }

  const agents = document.get('agents');
  if (!isSeq(agents)) {
    throw new AgentNotFoundError(name);
  }

  const names: string[] = [];
  for (const item of agents.items) {
    if (!isMap(item)) continue;
    const agentName = item.get('name');
    if (typeof agentName !== 'string') continue;
    names.push(agentName);

    if (agentName === name) {
      const current = item.get('weight', true);
      if (isScalar(current)) {
        current.value = weight;
      } else {
        item.set('weight', weight);
      }
      return document.toString();
    }
  }

  throw new AgentNotFoundError(name, names);
}

export class FileConfigSource implements ConfigSource {
  private readonly path: string;
  // edits run one at a time so each reads the previous one's result
  private writeChain: Promise<void> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
  }

  get description(): string {
    return `file:${this.path}`;
  }

  async read(): Promise<string> {
    return readFile(this.path, 'utf-8');
  }

  updateAgentWeight(name: string, weight: number): Promise<void> {
    const task = this.writeChain.then(() => this.writeWeight(name, weight));
    this.writeChain = task.catch(() => undefined);
    return task;
  }

  private async writeWeight(name: string, weight: number): Promise<void> {
    const updated = setAgentWeight(await this.read(), name, weight);
    // readers see either the old file or the new one
    const tempPath = `${this.path}.${uuidv4()}.tmp`;
    await writeFile(tempPath, updated, 'utf-8');
    await rename(tempPath, this.path);
  }
}

export class MemoryConfigSource implements ConfigSource {
  readonly description = 'memory';
  private document: string;

  constructor(document: string) {
    this.document = document;
  }

  async read(): Promise<string> {
    return this.document;
  }

  async updateAgentWeight(name: string, weight: number): Promise<void> {
    this.document = setAgentWeight(this.document, name, weight);
  }

  replace(document: string): void {
    this.document = document;
  }
}
