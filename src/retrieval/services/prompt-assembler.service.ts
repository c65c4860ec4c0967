/**
 * Prompt Assembler
 *
 * Turns ranked fragments and a query into the (system instruction, user
 * message) pair sent to a generation backend. Source numbers follow the
 * retrieval ranks and appear identically in the source list and in the
 * context block.
 */

import { Injectable, Logger } from '@nestjs/common';
import { PromptTemplate } from '@langchain/core/prompts';
import { fail, succeed, toError, type Outcome } from '../../common/errors';
import { PromptTemplateError } from '../errors/retrieval-errors';
import {
  SYSTEM_INSTRUCTION,
  buildSourceInstructions,
} from '../prompts/rag.prompts';
import type { AssembledPrompt, RankedFragment } from '../types';

export const QUERY_VARIABLE = 'query';

@Injectable()
export class PromptAssembler {
  private readonly logger = new Logger(PromptAssembler.name);

  /**
   * A query template must parse as an f-string whose only variable is
   * `{query}`. Literal braces are written `{{` and `}}`.
   */
  validateTemplate(template: string): Outcome<PromptTemplate, PromptTemplateError> {
    let prompt: PromptTemplate;
    try {
      prompt = PromptTemplate.fromTemplate(template, {
        templateFormat: 'f-string',
      });
    } catch (error) {
      const cause = toError(error);
      return fail(new PromptTemplateError(cause.message, cause));
    }

    const variables = prompt.inputVariables;
    if (!variables.includes(QUERY_VARIABLE)) {
      return fail(
        new PromptTemplateError(`missing the {${QUERY_VARIABLE}} placeholder`),
      );
    }
    const unknown = variables.filter((name) => name !== QUERY_VARIABLE);
    if (unknown.length > 0) {
      return fail(
        new PromptTemplateError(
          `unknown placeholder(s) ${unknown.map((name) => `{${name}}`).join(', ')}`,
        ),
      );
    }
    return succeed(prompt);
  }

  async assemble(
    fragments: RankedFragment[],
    query: string,
    template: string,
  ): Promise<Outcome<AssembledPrompt, PromptTemplateError>> {
    const validated = this.validateTemplate(template);
    if (!validated.success) {
      this.logger.error(validated.error.message);
      return validated;
    }

    let formattedQuery: string;
    try {
      formattedQuery = await validated.value.format({ [QUERY_VARIABLE]: query });
    } catch (error) {
      const cause = toError(error);
      return fail(new PromptTemplateError(cause.message, cause));
    }

    const sourceReferences = fragments
      .map(({ rank, fragment }) => {
        const { title, date } = fragment.metadata;
        return `Source ${rank}: ${title} | ${date}`;
      })
      .join('\n');

    const context = fragments
      .map(({ rank, fragment }) => {
        const { title, date } = fragment.metadata;
        return `Source ${rank}:\nTitle: ${title}\nDate: ${date}\nContent: ${fragment.pageContent}\n`;
      })
      .join('\n');

    const userMessage =
      formattedQuery + buildSourceInstructions(sourceReferences, context);

    this.logger.debug(
      `Assembled prompt: ${fragments.length} sources, user message ${userMessage.length} chars`,
    );

    return succeed({
      systemInstruction: SYSTEM_INSTRUCTION,
      userMessage,
      sourceReferences,
      context,
    });
  }
}
