/**
 * Retrieval HTTP Controller
 * Query answering and the generation backends catalog
 */

import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  ValidationPipe,
} from '@nestjs/common';
import { RagError, toHttpException } from '../common/errors';
import { SessionService } from '../session';
import type {
  AnswerResponseDto,
  BackendListDto,
} from './dto/answer-response.dto';
import { QueryRequestDto } from './dto/query-request.dto';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { AnswerService } from './services/answer.service';

@Controller()
export class RetrievalController {
  private readonly logger = new Logger(RetrievalController.name);

  constructor(
    private readonly answerService: AnswerService,
    private readonly llmProviderFactory: LLMProviderFactory,
    private readonly sessionService: SessionService,
  ) {}

  /**
   * POST /query
   *
   * Request:  { "query": "Qu'est-ce qui cause le paludisme ?", "backend": "llama" }
   * Response: { "status": "answered", "answer": "...", "sources": [...] }
   *       or  { "status": "no_results", "message": "...", "sources": [] }
   */
  @Post('query')
  @HttpCode(HttpStatus.OK)
  async query(
    @Body(ValidationPipe) body: QueryRequestDto,
  ): Promise<AnswerResponseDto> {
    this.logger.log(`Query request: "${body.query}"`);

    const outcome = await this.answerService.answer(
      this.sessionService.current(),
      { query: body.query, backend: body.backend },
    );
    if (!outcome.success) {
      throw toHttpException(outcome.error);
    }

    this.logger.log(
      `Query completed: ${outcome.value.status}, ${outcome.value.sources.length} sources, ` +
        `${outcome.value.durationMs}ms`,
    );
    return outcome.value;
  }

  /**
   * GET /backends
   */
  @Get('backends')
  listBackends(): BackendListDto {
    let defaultBackend: string;
    try {
      defaultBackend = this.llmProviderFactory.resolveBackend().id;
    } catch (error) {
      if (error instanceof RagError) {
        throw toHttpException(error);
      }
      throw error;
    }
    return {
      defaultBackend,
      backends: this.llmProviderFactory.describeBackends(),
    };
  }
}
