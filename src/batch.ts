import pLimit from 'p-limit';
import { toError } from './reliability/errors';
import type { FetchOptions, ResilientClient } from './reliability/types';

export interface BatchOptions extends FetchOptions {
  concurrency?: number;
  onSettled?: (progress: BatchProgress) => void;
}

export type BatchOutcome<TRequest, TResponse> =
  | { request: TRequest; ok: true; value: TResponse }
  | { request: TRequest; ok: false; error: Error };

export interface BatchProgress {
  total: number;
  completed: number;
  failed: number;
}

/**
 * Runs many fetches through one shared client. Outcomes come back in input
 * order; a failed request never stops the others.
 */
export async function fetchAll<TRequest, TResponse>(
  client: ResilientClient<TRequest, TResponse>,
  requests: TRequest[],
  options: BatchOptions = {}
): Promise<BatchOutcome<TRequest, TResponse>[]> {
  const { concurrency = 1, onSettled, ...fetchOptions } = options;
  const limit = pLimit(Math.max(1, concurrency));

  const progress: BatchProgress = {
    total: requests.length,
    completed: 0,
    failed: 0,
  };

  const tasks = requests.map((request) =>
    limit(async (): Promise<BatchOutcome<TRequest, TResponse>> => {
      try {
        const value = await client.fetch(request, fetchOptions);
        progress.completed++;
        onSettled?.({ ...progress });
        return { request, ok: true, value };
      } catch (error) {
        progress.failed++;
        onSettled?.({ ...progress });
        return { request, ok: false, error: toError(error) };
      }
    })
  );

  return Promise.all(tasks);
}
