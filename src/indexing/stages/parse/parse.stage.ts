/**
 * Parse Stage
 * Reads one XML-TEI file from disk and extracts a SourceDocument.
 */

import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { fail, toError, type Outcome } from '../../../common/errors';
import { parseTeiDocument } from './tei-document.parser';
import { FileReadError, type ParseError } from './errors/parse-errors';
import type { SourceDocument } from './types';

@Injectable()
export class ParseStage {
  private readonly logger = new Logger(ParseStage.name);

  async parseFile(
    filePath: string,
  ): Promise<Outcome<SourceDocument, ParseError>> {
    let xml: string;
    try {
      xml = await readFile(filePath, 'utf-8');
    } catch (error) {
      const readError = new FileReadError(filePath, toError(error));
      this.logger.warn(readError.message);
      return fail(readError);
    }

    const outcome = parseTeiDocument(xml, filePath);
    if (!outcome.success) {
      this.logger.warn(outcome.error.message);
      return outcome;
    }

    this.logger.debug(
      `Parsed ${filePath}: title="${outcome.value.title}", ` +
        `year=${outcome.value.year ?? 'n/a'}, persons=${outcome.value.persons.length}`,
    );
    return outcome;
  }
}
