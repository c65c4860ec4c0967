/**
 * Prompt HTTP Controller
 * Read, replace and reset the session's query template
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  Logger,
  Put,
  ValidationPipe,
} from '@nestjs/common';
import { toHttpException } from '../common/errors';
import { SessionService } from '../session';
import type { PromptTemplateDto } from './dto/answer-response.dto';
import { TemplateUpdateDto } from './dto/template-update.dto';
import { DEFAULT_QUERY_TEMPLATE } from './prompts/rag.prompts';
import { PromptAssembler } from './services/prompt-assembler.service';

@Controller('prompt/template')
export class PromptController {
  private readonly logger = new Logger(PromptController.name);

  constructor(
    private readonly promptAssembler: PromptAssembler,
    private readonly sessionService: SessionService,
  ) {}

  @Get()
  getTemplate(): PromptTemplateDto {
    return this.describe();
  }

  /**
   * PUT /prompt/template
   * The template is stored only if `{query}` is its one placeholder.
   */
  @Put()
  updateTemplate(
    @Body(ValidationPipe) body: TemplateUpdateDto,
  ): PromptTemplateDto {
    const validated = this.promptAssembler.validateTemplate(body.template);
    if (!validated.success) {
      throw toHttpException(validated.error);
    }

    this.sessionService.current().setQueryTemplate(body.template);
    this.logger.log(`Query template updated (${body.template.length} chars)`);
    return this.describe();
  }

  @Delete()
  resetTemplate(): PromptTemplateDto {
    this.sessionService.current().resetQueryTemplate();
    this.logger.log('Query template reset to default');
    return this.describe();
  }

  private describe(): PromptTemplateDto {
    const session = this.sessionService.current();
    return {
      template: session.queryTemplate,
      defaultTemplate: DEFAULT_QUERY_TEMPLATE,
      isDefault: session.usesDefaultTemplate,
    };
  }
}
