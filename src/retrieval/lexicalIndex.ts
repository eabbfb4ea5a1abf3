import type { ScoredSnippet } from './types';

const TOKEN_RE = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

interface IndexedSnippet {
  text: string;
  weights: Map<string, number>;
  norm: number;
}

function termFrequencies(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Read-only TF-IDF index over one namespace's snippets. Built once; `search`
 * never mutates it, so one instance is shared by every call in the namespace.
 * Results are ordered by cosine score, ties by insertion order.
 */
export class LexicalIndex {
  private readonly snippets: readonly IndexedSnippet[];
  private readonly idf: ReadonlyMap<string, number>;

  constructor(texts: readonly string[]) {
    const tokenized = texts.map((text) => tokenize(text));
    const documentFrequency = new Map<string, number>();
    for (const tokens of tokenized) {
      for (const term of new Set(tokens)) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const total = texts.length;
    const idf = new Map<string, number>();
    for (const [term, df] of documentFrequency) {
      idf.set(term, Math.log((total + 1) / (df + 1)) + 1);
    }
    this.idf = idf;

    this.snippets = texts.map((text, index) => {
      const weights = new Map<string, number>();
      let sumSquares = 0;
      for (const [term, tf] of termFrequencies(tokenized[index])) {
        const weight = tf * (idf.get(term) ?? 0);
        weights.set(term, weight);
        sumSquares += weight * weight;
      }
      return { text, weights, norm: Math.sqrt(sumSquares) };
    });
  }

  public get size(): number {
    return this.snippets.length;
  }

  public search(query: string, k: number): ScoredSnippet[] {
    if (k <= 0) {
      return [];
    }

    const queryWeights = new Map<string, number>();
    let sumSquares = 0;
    for (const [term, tf] of termFrequencies(tokenize(query))) {
      const idf = this.idf.get(term);
      if (idf === undefined) continue;
      const weight = tf * idf;
      queryWeights.set(term, weight);
      sumSquares += weight * weight;
    }
    const queryNorm = Math.sqrt(sumSquares);
    if (queryNorm === 0) {
      return [];
    }

    const scored: Array<{ index: number; score: number }> = [];
    this.snippets.forEach((snippet, index) => {
      if (snippet.norm === 0) return;
      let dot = 0;
      for (const [term, weight] of queryWeights) {
        const docWeight = snippet.weights.get(term);
        if (docWeight !== undefined) {
          dot += weight * docWeight;
        }
      }
      if (dot > 0) {
        scored.push({ index, score: dot / (queryNorm * snippet.norm) });
      }
    });

    scored.sort((a, b) => (b.score !== a.score ? b.score - a.score : a.index - b.index));

    return scored.slice(0, k).map(({ index, score }) => ({
      text: this.snippets[index].text,
      score,
    }));
  }
}
