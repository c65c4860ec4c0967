/**
 * Indexing HTTP Controller
 * Index loading, building, cancellation and status
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
import { toHttpException } from '../common/errors';
import { BuildIndexDto } from './dto/build-index.dto';
import { LoadIndexDto } from './dto/load-index.dto';
import { IndexingService } from './indexing.service';
import type { CorpusSelection } from './stages/load/types';
import type { BuildReport, IndexSummary, IndexingStatus } from './types';

@Controller('index')
export class IndexingController {
  private readonly logger = new Logger(IndexingController.name);

  constructor(private readonly indexingService: IndexingService) {}

  /**
   * POST /index/load
   *
   * Request:  { "directory": "embeddings/vector_index" }   (optional)
   */
  @Post('load')
  @HttpCode(HttpStatus.OK)
  async load(@Body(ValidationPipe) body: LoadIndexDto): Promise<IndexSummary> {
    const outcome = await this.indexingService.loadIndex(body.directory);
    if (!outcome.success) {
      throw toHttpException(outcome.error);
    }
    return outcome.value;
  }

  /**
   * POST /index/build
   *
   * Request:  { "mode": "provided", "files": ["data/bulletin-1923.xml"] }
   *       or  { "mode": "corpus" }
   */
  @Post('build')
  @HttpCode(HttpStatus.OK)
  async build(@Body(ValidationPipe) body: BuildIndexDto): Promise<BuildReport> {
    const selection: CorpusSelection =
      body.mode === 'provided'
        ? { mode: 'provided', files: body.files ?? [] }
        : { mode: 'corpus' };

    this.logger.log(`Build request: mode=${selection.mode}`);
    const outcome = await this.indexingService.build({ selection });
    if (!outcome.success) {
      throw toHttpException(outcome.error);
    }
    return outcome.value;
  }

  /**
   * POST /index/build/cancel
   */
  @Post('build/cancel')
  @HttpCode(HttpStatus.OK)
  cancel(): { cancelled: boolean } {
    return this.indexingService.cancelBuild();
  }

  /**
   * GET /index/status
   */
  @Get('status')
  async status(): Promise<IndexingStatus> {
    return this.indexingService.getStatus();
  }
}
