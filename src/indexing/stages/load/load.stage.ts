/**
 * Load Stage (Corpus Loader)
 *
 * Enumerates candidate XML-TEI files, parses each one and collects the
 * documents that parsed. A bad file is reported and skipped; an empty
 * selection is a valid state carrying a user-facing notice.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readdir, stat } from 'fs/promises';
import { basename, extname, join } from 'path';
import {
  OperationCancelledError,
  fail,
  succeed,
  type Outcome,
} from '../../../common/errors';
import { getList, isAborted } from '../../../common/utils';
import { ParseStage } from '../parse';
import {
  NO_FILES_MESSAGE,
  SUPPORTED_EXTENSIONS,
  toFileFailure,
  type CorpusSelection,
  type LoadOptions,
  type LoadResult,
} from './types';

const DEFAULT_CORPUS_DIRS = ['.', 'data'];

function hasSupportedExtension(filePath: string): boolean {
  const extension = extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

@Injectable()
export class LoadStage {
  private readonly logger = new Logger(LoadStage.name);
  private readonly corpusDirs: string[];

  constructor(
    private readonly parseStage: ParseStage,
    private readonly configService: ConfigService,
  ) {
    this.corpusDirs = getList(
      this.configService,
      'CORPUS_DIRS',
      DEFAULT_CORPUS_DIRS,
    );
  }

  async execute(
    selection: CorpusSelection,
    options: LoadOptions = {},
  ): Promise<Outcome<LoadResult>> {
    const startTime = Date.now();
    const { signal, onProgress } = options;

    // Step 1: Enumerate candidate files
    const files = await this.selectFiles(selection);
    this.logger.log(
      `=== Load Stage Start === mode=${selection.mode}, candidates=${files.length}`,
    );

    if (files.length === 0) {
      this.logger.error(NO_FILES_MESSAGE);
      return succeed({
        documents: [],
        documentYears: {},
        failures: [],
        candidateCount: 0,
        notice: NO_FILES_MESSAGE,
      });
    }

    // Step 2: Parse each file, skipping failures
    const result: LoadResult = {
      documents: [],
      documentYears: {},
      failures: [],
      candidateCount: files.length,
    };

    for (const [index, file] of files.entries()) {
      if (isAborted(signal)) {
        this.logger.warn(
          `Load cancelled after ${index}/${files.length} files`,
        );
        return fail(new OperationCancelledError('Corpus loading'));
      }

      const message = `Traitement du fichier ${index + 1}/${files.length}: ${basename(file)}`;
      this.logger.log(message);
      onProgress?.({
        stage: 'load',
        current: index + 1,
        total: files.length,
        file,
        message,
      });

      const outcome = await this.parseStage.parseFile(file);
      if (!outcome.success) {
        result.failures.push(toFileFailure(outcome.error));
        continue;
      }

      result.documents.push(outcome.value);
      if (outcome.value.year !== null) {
        result.documentYears[file] = outcome.value.year;
      }
    }

    const summary = `Traitement terminé! ${result.documents.length} documents analysés.`;
    onProgress?.({
      stage: 'load',
      current: files.length,
      total: files.length,
      message: summary,
    });

    this.logger.log(
      `=== Load Stage Complete === Duration: ${Date.now() - startTime}ms, ` +
        `documents=${result.documents.length}, skipped=${result.failures.length}`,
    );

    return succeed(result);
  }

  /**
   * Resolve the selection into an ordered list of existing XML files.
   */
  async selectFiles(selection: CorpusSelection): Promise<string[]> {
    if (selection.mode === 'provided') {
      const selected: string[] = [];
      for (const file of selection.files) {
        if (hasSupportedExtension(file) && (await isFile(file))) {
          selected.push(file);
        } else {
          this.logger.warn(`Ignoring provided file ${file}`);
        }
      }
      return selected;
    }

    const directories = selection.directories ?? this.corpusDirs;
    const selected: string[] = [];
    for (const directory of directories) {
      let entries: string[];
      try {
        entries = await readdir(directory);
      } catch {
        this.logger.debug(`Corpus directory ${directory} not found`);
        continue;
      }

      // readdir order is platform dependent
      for (const entry of [...entries].sort()) {
        const filePath = join(directory, entry);
        if (hasSupportedExtension(entry) && (await isFile(filePath))) {
          selected.push(filePath);
        }
      }
    }
    return selected;
  }
}
