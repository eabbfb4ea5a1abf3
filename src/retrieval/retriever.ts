import { raceWithAbort, withTimeout } from '../async';
import { AbortedError, NamespaceNotFoundError, TimeoutError } from '../errors';
import { log } from '../log';
import { incOperatorAlert, incStageError, startStageTimer } from '../metrics';
import type { Namespace } from '../calls/types';
import { LexicalIndex } from './lexicalIndex';
import { NamespaceRegistry } from './namespaceRegistry';
import type { RetrievedContext, Retriever, RetrieveOptions, ScoredSnippet } from './types';

export class IndexRetriever implements Retriever {
  constructor(private readonly indexes: NamespaceRegistry<LexicalIndex>) {}

  public async retrieve(
    namespace: Namespace,
    query: string,
    k: number,
    options: RetrieveOptions = {},
  ): Promise<ScoredSnippet[]> {
    if (options.signal?.aborted) {
      throw new AbortedError('retrieval aborted');
    }
    const index = this.indexes.resolve(namespace);
    return index.search(query, k);
  }
}

export type RetrievalDegradation = 'timeout' | 'namespace_not_found' | 'error';

export interface BoundedRetrievalResult {
  context: RetrievedContext;
  degraded?: RetrievalDegradation;
}

/**
 * Runs one retrieval under a deadline. Any failure degrades to an empty context;
 * only cancellation of the turn itself propagates.
 */
export async function retrieveWithDeadline(params: {
  retriever: Retriever;
  namespace: Namespace;
  query: string;
  k: number;
  timeoutMs: number;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}): Promise<BoundedRetrievalResult> {
  const { retriever, namespace, query, k, timeoutMs, signal } = params;
  const logContext = { namespace, ...(params.logContext ?? {}) };
  const empty: RetrievedContext = { namespace, query, snippets: [] };
  const endTimer = startStageTimer('retrieval', namespace);

  try {
    const snippets = await raceWithAbort(
      withTimeout(retriever.retrieve(namespace, query, k, { signal }), timeoutMs, 'retrieval'),
      signal,
    );
    return { context: { namespace, query, snippets } };
  } catch (error) {
    if (error instanceof AbortedError) {
      throw error;
    }
    if (error instanceof NamespaceNotFoundError) {
      incOperatorAlert('namespace_not_found');
      log.error(
        { event: 'retrieval_namespace_not_found', alert: true, ...logContext },
        'no knowledge index for namespace',
      );
      return { context: empty, degraded: 'namespace_not_found' };
    }

    incStageError('retrieval', namespace);
    if (error instanceof TimeoutError) {
      log.warn(
        { event: 'retrieval_timeout', timeout_ms: timeoutMs, ...logContext },
        'retrieval timed out - continuing without context',
      );
      return { context: empty, degraded: 'timeout' };
    }

    log.error(
      { err: error, event: 'retrieval_failed', ...logContext },
      'retrieval failed - continuing without context',
    );
    return { context: empty, degraded: 'error' };
  } finally {
    endTimer();
  }
}
