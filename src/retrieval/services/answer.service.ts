/**
 * Answer Service
 * Query answering over the session's active index: retrieve → assemble → generate
 */

import { Injectable, Logger } from '@nestjs/common';
import { fail, succeed, type Outcome } from '../../common/errors';
import { documentHeader } from '../../indexing/stages/parse/tei-document.parser';
import type { SessionContext } from '../../session';
import { NoActiveIndexError } from '../errors/retrieval-errors';
import { NO_RESULTS_MESSAGE } from '../prompts/rag.prompts';
import type { RankedFragment } from '../types';
import { GenerationService } from './generation.service';
import { PromptAssembler } from './prompt-assembler.service';
import { RetrieverService } from './retriever.service';

export interface AnswerRequest {
  query: string;
  backend?: string;
  signal?: AbortSignal;
}

export interface SourceView {
  number: number;
  title: string;
  date: string;
  year: number | null;
  file: string;
  persons: string[];
  excerpt: string;
}

export type AnswerResult =
  | {
      status: 'answered';
      query: string;
      answer: string;
      backend: string;
      model: string;
      sources: SourceView[];
      durationMs: number;
    }
  | {
      status: 'no_results';
      query: string;
      message: string;
      sources: [];
      durationMs: number;
    };

/**
 * Fragment text without the `Document: … | Date: …` header the parser
 * puts at the start of each body.
 */
export function toSourceView({ rank, fragment }: RankedFragment): SourceView {
  const { title, date, year, source, persons } = fragment.metadata;
  const header = documentHeader(title, date);
  const excerpt = fragment.pageContent.startsWith(header)
    ? fragment.pageContent.slice(header.length)
    : fragment.pageContent;

  return {
    number: rank,
    title,
    date,
    year,
    file: source,
    persons: [...persons],
    excerpt,
  };
}

@Injectable()
export class AnswerService {
  private readonly logger = new Logger(AnswerService.name);

  constructor(
    private readonly retrieverService: RetrieverService,
    private readonly promptAssembler: PromptAssembler,
    private readonly generationService: GenerationService,
  ) {}

  async answer(
    session: SessionContext,
    request: AnswerRequest,
  ): Promise<Outcome<AnswerResult>> {
    const startTime = Date.now();
    const { query } = request;

    // Step 1: Active index
    const handle = session.index;
    if (handle === null) {
      return fail(new NoActiveIndexError());
    }

    // Step 2: Retrieve
    const retrieved = await this.retrieverService.retrieve(handle, query);
    if (!retrieved.success) {
      return retrieved;
    }
    if (retrieved.value.length === 0) {
      this.logger.warn(`No relevant fragments for query "${query}"`);
      const empty: AnswerResult = {
        status: 'no_results',
        query,
        message: NO_RESULTS_MESSAGE,
        sources: [],
        durationMs: Date.now() - startTime,
      };
      return succeed(empty);
    }

    // Step 3: Assemble
    const prompt = await this.promptAssembler.assemble(
      retrieved.value,
      query,
      session.queryTemplate,
    );
    if (!prompt.success) {
      return prompt;
    }

    // Step 4: Generate
    const generated = await this.generationService.generate(
      prompt.value,
      request.backend,
      request.signal,
    );
    if (!generated.success) {
      return generated;
    }

    const { answer, backend, model } = generated.value;
    session.appendTurn({
      query,
      answer,
      backend,
      askedAt: new Date().toISOString(),
    });

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `Answered with ${retrieved.value.length} sources via ${backend} in ${durationMs}ms`,
    );

    const result: AnswerResult = {
      status: 'answered',
      query,
      answer,
      backend,
      model,
      sources: retrieved.value.map(toSourceView),
      durationMs,
    };
    return succeed(result);
  }
}
