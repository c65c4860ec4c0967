/**
 * Persist Stage
 *
 * Writes an index and its sidecar metadata as one unit: both files go to a
 * staging directory first, which then replaces the target directory by
 * rename. A reader sees either the previous index or the new one, never a
 * mix of the two.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  RagError,
  fail,
  succeed,
  toError,
  type Outcome,
} from '../../../common/errors';
import { getPositiveInt, withTimeout } from '../../../common/utils';
import type { LocalVectorStore } from '../../../vector-store/local-vector.store';
import {
  indexFilePath,
  metadataFilePath,
  type IndexMetadata,
} from '../../../vector-store/index-layout';
import { IndexWriteError } from './errors/persist-errors';

const DEFAULT_IO_TIMEOUT_MS = 30000;

export interface PersistResult {
  directory: string;
  metadata: IndexMetadata;
  durationMs: number;
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

@Injectable()
export class PersistStage {
  private readonly logger = new Logger(PersistStage.name);
  private readonly ioTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.ioTimeoutMs = getPositiveInt(
      this.configService,
      'INDEX_IO_TIMEOUT_MS',
      DEFAULT_IO_TIMEOUT_MS,
    );
  }

  async execute(
    directory: string,
    store: LocalVectorStore,
    metadata: IndexMetadata,
  ): Promise<Outcome<PersistResult>> {
    const startTime = Date.now();

    try {
      await withTimeout(
        () => this.writeAtomically(directory, store, metadata),
        this.ioTimeoutMs,
        `Persisting index to ${directory}`,
      );
    } catch (error) {
      const cause = toError(error);
      const failure =
        cause instanceof RagError
          ? cause
          : new IndexWriteError(directory, cause.message, cause);
      this.logger.error(`❌ ${failure.message}`);
      return fail(failure);
    }

    const durationMs = Date.now() - startTime;
    this.logger.log(
      `✅ Index persisted to ${directory} in ${durationMs}ms: ` +
        `${metadata.fragmentCount} fragments, ${metadata.documentCount} documents, ` +
        `complete=${metadata.complete}`,
    );
    return succeed({ directory, metadata, durationMs });
  }

  private async writeAtomically(
    directory: string,
    store: LocalVectorStore,
    metadata: IndexMetadata,
  ): Promise<void> {
    const suffix = uuidv4();
    const staging = `${directory}.staging-${suffix}`;
    const retired = `${directory}.old-${suffix}`;

    await mkdir(dirname(directory), { recursive: true });
    await mkdir(staging, { recursive: true });

    let retiredPrevious = false;
    try {
      // Step 1: write both artifacts beside the live index
      await writeFile(indexFilePath(staging), JSON.stringify(store.serialize()));
      await writeFile(
        metadataFilePath(staging),
        JSON.stringify(metadata, null, 2),
      );

      // Step 2: swap directories
      if (await exists(directory)) {
        await rename(directory, retired);
        retiredPrevious = true;
      }
      await rename(staging, directory);
    } catch (error) {
      await rm(staging, { recursive: true, force: true });
      if (retiredPrevious && !(await exists(directory))) {
        await rename(retired, directory);
      }
      throw error;
    }

    // Step 3: drop the previous index
    if (retiredPrevious) {
      await rm(retired, { recursive: true, force: true });
    }
  }
}
