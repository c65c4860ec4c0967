import { ConfigService } from '@nestjs/config';
import { RagErrorKind } from '../../../common/errors';
import type { SourceDocument } from '../parse';
import { ChunkStage } from './chunk.stage';
import { BoundaryTextSplitter } from './services/boundary-text-splitter';
import { InvalidChunkingConfigError } from './errors/chunk-errors';
import type { ChunkOutput, ChunkingConfig } from './types';

function makeDocument(
  identifier: string,
  body: string,
  overrides: Partial<SourceDocument> = {},
): SourceDocument {
  return {
    identifier,
    title: 'Bulletin',
    dateText: '1931',
    year: 1931,
    body,
    persons: ['Charles Nicolle'],
    ...overrides,
  };
}

// Long enough to need many windows, mixing every boundary kind.
function longBody(): string {
  const paragraphs: string[] = [];
  for (let p = 0; p < 12; p++) {
    const sentences: string[] = [];
    for (let s = 0; s < 9; s++) {
      sentences.push(
        `Phrase ${p}-${s} sur la transmission des parasites par les insectes vecteurs`,
      );
    }
    paragraphs.push(sentences.join('. ') + '.');
  }
  return paragraphs.join('\n\n');
}

describe('BoundaryTextSplitter', () => {
  it('keeps short text as a single chunk', () => {
    const splitter = new BoundaryTextSplitter({ chunkSize: 40, chunkOverlap: 10 });

    expect(splitter.splitSync('Texte court.')).toEqual(['Texte court.']);
  });

  it('prefers paragraph boundaries, then words', () => {
    const splitter = new BoundaryTextSplitter({ chunkSize: 40, chunkOverlap: 10 });
    const text =
      'Premier paragraphe court.\n\nDeuxième paragraphe un peu plus long que le premier.';

    expect(splitter.splitSync(text)).toEqual([
      'Premier paragraphe court.\n\n',
      'e court.\n\nDeuxième paragraphe un peu ',
      'he un peu plus long que le premier.',
    ]);
  });

  it('cuts hard when no boundary exists', () => {
    const splitter = new BoundaryTextSplitter({ chunkSize: 20, chunkOverlap: 5 });

    expect(splitter.splitSync('x'.repeat(50))).toEqual([
      'x'.repeat(20),
      'x'.repeat(20),
      'x'.repeat(20),
    ]);
  });

  it('does not cut a hard window inside a surrogate pair', () => {
    const splitter = new BoundaryTextSplitter({ chunkSize: 10, chunkOverlap: 2 });
    const text = 'a'.repeat(9) + '\u{1F600}' + 'b'.repeat(12);

    expect(splitter.splitSync(text)).toEqual([
      'a'.repeat(9),
      'aa\u{1F600}' + 'b'.repeat(6),
      'b'.repeat(8),
    ]);
  });

  it('resolves splitText asynchronously with the same chunks', async () => {
    const splitter = new BoundaryTextSplitter({ chunkSize: 20, chunkOverlap: 5 });
    const text = 'x'.repeat(50);

    await expect(splitter.splitText(text)).resolves.toEqual(
      splitter.splitSync(text),
    );
  });
});

describe('ChunkStage', () => {
  const config = { maxChunkSize: 500, overlapSize: 120 };
  let stage: ChunkStage;

  beforeEach(() => {
    stage = new ChunkStage(new ConfigService({}));
  });

  function chunk(
    documents: SourceDocument[],
    chunking: ChunkingConfig = config,
  ): ChunkOutput {
    const outcome = stage.execute(documents, chunking);
    if (!outcome.success) throw outcome.error;
    return outcome.value;
  }

  it('uses the reference configuration by default', () => {
    expect(stage.getConfig()).toEqual({ maxChunkSize: 2500, overlapSize: 800 });
  });

  it('produces identical boundaries on every run', () => {
    const documents = [makeDocument('a.xml', longBody())];

    const first = chunk(documents).fragments;
    const second = chunk(documents).fragments;

    expect(second.map((f) => f.pageContent)).toEqual(
      first.map((f) => f.pageContent),
    );
    expect(second.map((f) => f.id)).toEqual(first.map((f) => f.id));
  });

  it('bounds every fragment by the maximum size', () => {
    const { fragments } = chunk([makeDocument('a.xml', longBody())]);

    expect(fragments.length).toBeGreaterThan(5);
    for (const fragment of fragments) {
      expect(fragment.pageContent.length).toBeLessThanOrEqual(500);
    }
  });

  it('shares exactly the overlap between neighbours', () => {
    const body = longBody();
    const { fragments } = chunk([makeDocument('a.xml', body)]);

    for (let i = 1; i < fragments.length; i++) {
      const previous = fragments[i - 1].pageContent;
      const current = fragments[i].pageContent;
      expect(current.slice(0, 120)).toBe(previous.slice(-120));
    }

    const rebuilt =
      fragments[0].pageContent +
      fragments
        .slice(1)
        .map((f) => f.pageContent.slice(120))
        .join('');
    expect(rebuilt).toBe(body);
  });

  it('copies parent metadata onto every fragment in order', () => {
    const documents = [
      makeDocument('a.xml', longBody()),
      makeDocument('b.xml', 'Corps court.', {
        title: 'Autre',
        dateText: 'Unknown Date',
        year: null,
        persons: [],
      }),
    ];

    const { fragments, statistics } = chunk(documents);

    const last = fragments[fragments.length - 1];
    expect(last.id).toBe('b.xml#0');
    expect(last.metadata).toEqual({
      source: 'b.xml',
      title: 'Autre',
      date: 'Unknown Date',
      year: null,
      persons: [],
    });
    expect(fragments[1].id).toBe('a.xml#1');
    expect(fragments[1].metadata).toEqual({
      source: 'a.xml',
      title: 'Bulletin',
      date: '1931',
      year: 1931,
      persons: ['Charles Nicolle'],
    });
    expect(statistics.documentCount).toBe(2);
    expect(statistics.fragmentCount).toBe(fragments.length);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    const outcome = stage.execute([makeDocument('a.xml', 'x')], {
      maxChunkSize: 100,
      overlapSize: 100,
    });

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error).toBeInstanceOf(InvalidChunkingConfigError);
    expect(outcome.error.kind).toBe(RagErrorKind.CONFIGURATION);
    expect(outcome.error.message).toBe(
      'overlapSize (100) must be smaller than maxChunkSize (100)',
    );
  });

  it('rejects a chunk size that is not a positive integer', () => {
    const outcome = stage.execute([makeDocument('a.xml', 'x')], {
      maxChunkSize: 12.5,
      overlapSize: 2,
    });

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error.code).toBe('CHUNK_INVALID_CONFIG');
  });
});
