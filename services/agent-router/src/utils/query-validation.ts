import { ValidationError } from '../monitoring/errors.js';

// Models that support Bing grounding; used only to spot swapped parameters
const GROUNDING_MODELS = ['gpt-4o', 'gpt-4', 'gpt-4.1-mini', 'gpt-4-turbo', 'gpt-35-turbo', 'gpt-3.5-turbo'];

function normalizeModelName(value: string): string {
  return value.toLowerCase().replace(/[\s.-]/g, '');
}

/**
 * Reject requests whose `query` and `model` look swapped.
 * Returns the trimmed query and model.
 */
export function validateGroundingParams(query: unknown, model: unknown): { query: string; model?: string } {
  if (typeof query !== 'string' || query.trim() === '') {
    throw new ValidationError('query is required');
  }
  let trimmedModel: string | undefined;
  if (typeof model === 'string') {
    trimmedModel = model.trim() || undefined;
  } else if (model !== undefined) {
    throw new ValidationError('model must be a string');
  }

  const trimmedQuery = query.trim();

  if (trimmedModel && /[\s?]/.test(trimmedModel)) {
    throw new ValidationError(
      `Invalid model '${trimmedModel}'. It looks like you swapped 'query' and 'model' parameters. ` +
        `Use: ?query=your+question&model=gpt-4o`,
      { model: trimmedModel }
    );
  }

  const normalizedQuery = normalizeModelName(trimmedQuery);
  if (GROUNDING_MODELS.some((name) => normalizeModelName(name) === normalizedQuery)) {
    throw new ValidationError(
      `Invalid query '${trimmedQuery}'. It looks like a model name. ` +
        `Did you swap 'query' and 'model' parameters? Use: ?query=your+question&model=${trimmedQuery}`,
      { query: trimmedQuery }
    );
  }

  return trimmedModel ? { query: trimmedQuery, model: trimmedModel } : { query: trimmedQuery };
}
