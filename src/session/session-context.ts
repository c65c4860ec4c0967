/**
 * State of one interactive session: the active index, the query template
 * and the chat history. Each field has one owner: indexing swaps the index,
 * the prompt endpoints set the template, answering appends turns.
 */

import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_QUERY_TEMPLATE } from '../retrieval/prompts/rag.prompts';
import type { IndexHandle } from '../retrieval/types';

export interface ChatTurn {
  query: string;
  answer: string;
  backend: string;
  askedAt: string;
}

export class SessionContext {
  readonly id = uuidv4();
  readonly createdAt = new Date().toISOString();

  private activeIndex: IndexHandle | null = null;
  private template = DEFAULT_QUERY_TEMPLATE;
  private readonly turns: ChatTurn[] = [];

  get index(): IndexHandle | null {
    return this.activeIndex;
  }

  /**
   * Replace the active index in one assignment; queries already holding
   * the previous handle finish against it.
   */
  activateIndex(handle: IndexHandle): IndexHandle | null {
    const previous = this.activeIndex;
    this.activeIndex = handle;
    return previous;
  }

  get queryTemplate(): string {
    return this.template;
  }

  get usesDefaultTemplate(): boolean {
    return this.template === DEFAULT_QUERY_TEMPLATE;
  }

  // Callers validate first
  setQueryTemplate(template: string): void {
    this.template = template;
  }

  resetQueryTemplate(): void {
    this.template = DEFAULT_QUERY_TEMPLATE;
  }

  get history(): ChatTurn[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  appendTurn(turn: ChatTurn): void {
    this.turns.push({ ...turn });
  }

  clearHistory(): number {
    const cleared = this.turns.length;
    this.turns.length = 0;
    return cleared;
  }
}
