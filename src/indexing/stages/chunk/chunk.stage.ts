import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Document } from '@langchain/core/documents';
import { fail, succeed, type Outcome } from '../../../common/errors';
import { getNumber } from '../../../common/utils';
import type { SourceDocument } from '../parse';
import { BoundaryTextSplitter } from './services/boundary-text-splitter';
import { InvalidChunkingConfigError } from './errors/chunk-errors';
import {
  fragmentId,
  type ChunkOutput,
  type ChunkingConfig,
  type Fragment,
  type FragmentMetadata,
} from './types';

export const DEFAULT_CHUNK_SIZE = 2500;
export const DEFAULT_CHUNK_OVERLAP = 800;

/**
 * Chunk Stage - splits each document body into overlapping fragments that
 * carry the parent's metadata.
 */
@Injectable()
export class ChunkStage {
  private readonly logger = new Logger(ChunkStage.name);
  private readonly config: ChunkingConfig;

  constructor(private readonly configService: ConfigService) {
    this.config = {
      maxChunkSize: getNumber(this.configService, 'CHUNK_SIZE', DEFAULT_CHUNK_SIZE),
      overlapSize: getNumber(
        this.configService,
        'CHUNK_OVERLAP',
        DEFAULT_CHUNK_OVERLAP,
      ),
    };
  }

  getConfig(): ChunkingConfig {
    return { ...this.config };
  }

  /**
   * Fails with InvalidChunkingConfigError when sizes are not positive
   * integers or the overlap is not smaller than the chunk size.
   */
  execute(
    documents: readonly SourceDocument[],
    config: ChunkingConfig = this.config,
  ): Outcome<ChunkOutput> {
    const startTime = Date.now();
    const invalid = validateConfig(config);
    if (invalid !== null) {
      this.logger.error(`[Chunk Stage] ${invalid.message}`);
      return fail(invalid);
    }
    const splitter = new BoundaryTextSplitter({
      chunkSize: config.maxChunkSize,
      chunkOverlap: config.overlapSize,
    });

    const fragments: Fragment[] = [];
    for (const document of documents) {
      const metadata = toFragmentMetadata(document);
      const pieces = splitter.splitSync(document.body);

      pieces.forEach((text, chunkIndex) => {
        fragments.push(
          new Document<FragmentMetadata>({
            id: fragmentId(document.identifier, chunkIndex),
            pageContent: text,
            metadata: { ...metadata, persons: [...metadata.persons] },
          }),
        );
      });

      this.logger.debug(
        `Document ${document.identifier} split into ${pieces.length} fragments`,
      );
    }

    const lengths = fragments.map((fragment) => fragment.pageContent.length);
    const statistics = {
      documentCount: documents.length,
      fragmentCount: fragments.length,
      averageFragmentLength:
        lengths.length > 0
          ? Math.round(lengths.reduce((sum, n) => sum + n, 0) / lengths.length)
          : 0,
      maxFragmentLength: lengths.length > 0 ? Math.max(...lengths) : 0,
      durationMs: Date.now() - startTime,
    };

    this.logger.log(
      `Chunking complete: ${statistics.fragmentCount} fragments from ` +
        `${statistics.documentCount} documents ` +
        `(avg ${statistics.averageFragmentLength} chars, max ${statistics.maxFragmentLength})`,
    );

    const output: ChunkOutput = { fragments, statistics };
    return succeed(output);
  }
}

function validateConfig({
  maxChunkSize,
  overlapSize,
}: ChunkingConfig): InvalidChunkingConfigError | null {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize <= 0) {
    return new InvalidChunkingConfigError(
      `maxChunkSize must be a positive integer, got ${maxChunkSize}`,
    );
  }
  if (!Number.isInteger(overlapSize) || overlapSize <= 0) {
    return new InvalidChunkingConfigError(
      `overlapSize must be a positive integer, got ${overlapSize}`,
    );
  }
  if (overlapSize >= maxChunkSize) {
    return new InvalidChunkingConfigError(
      `overlapSize (${overlapSize}) must be smaller than maxChunkSize (${maxChunkSize})`,
    );
  }
  return null;
}

function toFragmentMetadata(document: SourceDocument): FragmentMetadata {
  return {
    source: document.identifier,
    title: document.title,
    date: document.dateText,
    year: document.year,
    persons: [...document.persons],
  };
}
