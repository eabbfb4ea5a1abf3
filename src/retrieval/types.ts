import type { Namespace } from '../calls/types';

export interface ScoredSnippet {
  text: string;
  score: number;
}

/** Result of one retrieval: scoped to one namespace and one query, discarded after the turn. */
export interface RetrievedContext {
  namespace: Namespace;
  query: string;
  snippets: ScoredSnippet[];
}

export interface RetrieveOptions {
  signal?: AbortSignal;
}

/**
 * Nearest-neighbour text retriever scoped to a namespace.
 * Throws NamespaceNotFoundError when no index exists for the namespace; an
 * existing namespace with nothing relevant returns an empty list.
 */
export interface Retriever {
  retrieve(
    namespace: Namespace,
    query: string,
    k: number,
    options?: RetrieveOptions,
  ): Promise<ScoredSnippet[]>;
}
