import { Embeddings, type EmbeddingsParams } from '@langchain/core/embeddings';

export interface HashingEmbeddingsParams extends EmbeddingsParams {
  dimensions?: number;
}

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= 3);
}

/**
 * Deterministic bag-of-words embeddings for tests: each token is hashed
 * into a bucket; the last component is a constant so no vector is zero.
 */
export class HashingEmbeddings extends Embeddings {
  readonly dimensions: number;
  readonly calls: string[][] = [];

  constructor(params: HashingEmbeddingsParams = {}) {
    super(params);
    this.dimensions = params.dimensions ?? 64;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.vectorize(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % (this.dimensions - 1)] += 1;
    }
    vector[this.dimensions - 1] = 0.1;
    return vector;
  }
}
