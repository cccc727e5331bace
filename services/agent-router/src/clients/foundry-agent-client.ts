/**
 * Azure AI Foundry agent client
 * Runs one grounded question against a provisioned agent and returns its answer with citations
 */

import { AgentsClient } from '@azure/ai-agents';
import { DefaultAzureCredential } from '@azure/identity';
import { AgentAnswer, Citation } from '../types/index.js';
import { isRecord } from '../utils/guards.js';
import { logger } from '../utils/logger.js';

export interface AnswerOptions {
  /** Aborting stops the run poll; the thread is still deleted */
  abortSignal?: AbortSignal;
}

/**
 * Something that can answer a query given the upstream agent handle.
 */
export interface AgentBackend {
  answer(agentId: string, query: string, options?: AnswerOptions): Promise<AgentAnswer>;
}

interface RequestOptions {
  abortSignal?: AbortSignal;
}

export interface FoundryRun {
  id: string;
  status: string;
  lastError?: unknown;
}

export interface FoundryMessage {
  role: string;
  content: unknown[];
}

/**
 * The part of `AgentsClient` a grounded answer needs
 */
export interface FoundryAgentsApi {
  threads: {
    create(options?: RequestOptions): Promise<{ id: string }>;
    delete(threadId: string): Promise<unknown>;
  };
  messages: {
    create(threadId: string, role: 'user', content: string, options?: RequestOptions): Promise<unknown>;
    list(threadId: string, options?: { order?: 'asc' | 'desc' }): AsyncIterable<FoundryMessage>;
  };
  runs: {
    createAndPoll(
      threadId: string,
      agentId: string,
      options?: RequestOptions & { pollingOptions?: { intervalInMs?: number } }
    ): PromiseLike<FoundryRun>;
  };
}

function runErrorMessage(lastError: unknown): string {
  if (isRecord(lastError) && typeof lastError['message'] === 'string') {
    return lastError['message'];
  }
  return 'Unknown error';
}

interface TextPart {
  value: string;
  annotations: unknown[];
}

// Inline markers like 【3:0†source】 that the agent leaves in its text
const CITATION_MARKER = /【\d+:\d+†[^】]+】/g;

export function stripCitationMarkers(text: string): string {
  return text.replace(CITATION_MARKER, '').trim();
}

function readTextPart(content: unknown): TextPart | null {
  if (!isRecord(content) || content['type'] !== 'text') {
    return null;
  }
  const text = content['text'];
  if (!isRecord(text)) {
    return null;
  }
  const { value, annotations } = text;
  if (typeof value !== 'string') {
    return null;
  }
  return { value, annotations: Array.isArray(annotations) ? annotations : [] };
}

/**
 * Map message annotations to citations. Ids are 1-based positions among the annotations.
 */
export function extractCitations(annotations: unknown[]): Citation[] {
  const citations: Citation[] = [];

  annotations.forEach((annotation, index) => {
    if (!isRecord(annotation)) return;
    const id = index + 1;

    const urlCitation = annotation['urlCitation'];
    if (isRecord(urlCitation)) {
      const { url, title } = urlCitation;
      if (typeof url === 'string') {
        citations.push({ id, type: 'url', url, title: typeof title === 'string' ? title : url });
        return;
      }
    }

    const fileCitation = annotation['fileCitation'];
    if (isRecord(fileCitation)) {
      const { quote } = fileCitation;
      citations.push(typeof quote === 'string' ? { id, type: 'file', quote } : { id, type: 'file' });
    }
  });

  return citations;
}

export class FoundryAgentBackend implements AgentBackend {
  private readonly client: FoundryAgentsApi;
  private readonly pollIntervalMs: number;

  constructor(projectEndpoint: string, options: { client?: FoundryAgentsApi; pollIntervalMs?: number } = {}) {
    this.client = options.client ?? new AgentsClient(projectEndpoint, new DefaultAzureCredential());
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
  }

  async answer(agentId: string, query: string, options: AnswerOptions = {}): Promise<AgentAnswer> {
    const { abortSignal } = options;
    const thread = await this.client.threads.create({ abortSignal });

    try {
      await this.client.messages.create(thread.id, 'user', query, { abortSignal });

      const run = await this.client.runs.createAndPoll(thread.id, agentId, {
        abortSignal,
        pollingOptions: { intervalInMs: this.pollIntervalMs },
      });

      if (run.status === 'failed') {
        throw new Error(`Agent run ${run.id} failed: ${runErrorMessage(run.lastError)}`);
      }
      if (run.status !== 'completed') {
        throw new Error(`Agent run ${run.id} ended with status '${run.status}'`);
      }

      // newest assistant text wins
      let answer: AgentAnswer = { content: '', citations: [] };
      for await (const message of this.client.messages.list(thread.id, { order: 'asc' })) {
        if (message.role !== 'assistant') continue;
        const parts = message.content.map(readTextPart).filter((part): part is TextPart => part !== null);
        const last = parts[parts.length - 1];
        if (last) {
          answer = {
            content: stripCitationMarkers(last.value),
            citations: extractCitations(last.annotations),
          };
        }
      }

      return answer;
    } finally {
      await this.deleteThread(thread.id);
    }
  }

  private async deleteThread(threadId: string): Promise<void> {
    try {
      await this.client.threads.delete(threadId);
    } catch (error) {
      logger.warn(`Failed to delete thread ${threadId}:`, error);
    }
  }
}

/**
 * Stand-in used when no project endpoint is configured; every call fails upstream.
 */
export class UnconfiguredBackend implements AgentBackend {
  async answer(agentId: string): Promise<AgentAnswer> {
    throw new Error(`AZURE_AI_PROJECT_ENDPOINT is not set; cannot reach agent ${agentId || '(unprovisioned)'}`);
  }
}
