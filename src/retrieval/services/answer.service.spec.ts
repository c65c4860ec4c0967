import { ConfigService } from '@nestjs/config';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { HashingEmbeddings } from '../../../test/utils/hashing-embeddings';
import { makeFragment } from '../../../test/utils/fragments';
import { RagErrorKind } from '../../common/errors';
import { documentHeader } from '../../indexing/stages/parse/tei-document.parser';
import { SessionContext } from '../../session';
import { EmbeddingProviderFactory } from '../../vector-store/embedding-provider.factory';
import { LocalVectorStore } from '../../vector-store/local-vector.store';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { NO_RESULTS_MESSAGE } from '../prompts/rag.prompts';
import { AnswerService } from './answer.service';
import { GenerationService } from './generation.service';
import { IndexLoader } from './index-loader.service';
import { PromptAssembler } from './prompt-assembler.service';
import { RetrieverService } from './retriever.service';

const QUERY = "Qu'est-ce qui cause le paludisme?";
const BODY = `${documentHeader('Séance du 14 mars', '14 mars 1923')}Le paludisme est causé par Plasmodium`;

describe('AnswerService', () => {
  const config = new ConfigService({ OPENROUTER_API_KEY: 'test-secret' });
  const llmProviderFactory = new LLMProviderFactory(config);
  const loader = new IndexLoader(new EmbeddingProviderFactory(config), config);
  const service = new AnswerService(
    new RetrieverService(config),
    new PromptAssembler(),
    new GenerationService(llmProviderFactory, config),
  );
  let createChatModel: jest.SpyInstance;
  let session: SessionContext;

  beforeEach(() => {
    session = new SessionContext();
    createChatModel = jest
      .spyOn(llmProviderFactory, 'createChatModel')
      .mockReturnValue(
        new FakeListChatModel({ responses: ['Plasmodium (Source 1).'] }),
      );
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function activate(withFragments: boolean): Promise<void> {
    const store = new LocalVectorStore(new HashingEmbeddings());
    if (withFragments) {
      await store.addDocuments([
        makeFragment('seance-1923.xml', 0, BODY, {
          title: 'Séance du 14 mars',
          date: '14 mars 1923',
          persons: ['Alphonse Laveran'],
        }),
      ]);
    }
    session.activateIndex(
      loader.createHandle(
        store,
        {
          embeddingProvider: 'ollama',
          embeddingModelName: 'hashing-test',
          dimensions: store.dimensions,
          fragmentCount: store.size,
          documentCount: store.documentCount,
          createdAt: '2024-01-01T00:00:00.000Z',
          complete: true,
        },
        '/tmp/index',
      ),
    );
  }

  it('answers with numbered sources and records the turn', async () => {
    await activate(true);

    const outcome = await service.answer(session, { query: QUERY, backend: 'llama' });

    if (!outcome.success) throw outcome.error;
    const result = outcome.value;
    if (result.status !== 'answered') throw new Error('expected an answer');
    expect(result.answer).toBe('Plasmodium (Source 1).');
    expect(result.backend).toBe('llama');
    expect(result.sources).toEqual([
      {
        number: 1,
        title: 'Séance du 14 mars',
        date: '14 mars 1923',
        year: 1923,
        file: 'seance-1923.xml',
        persons: ['Alphonse Laveran'],
        excerpt: 'Le paludisme est causé par Plasmodium',
      },
    ]);
    expect(session.history).toEqual([
      {
        query: QUERY,
        answer: 'Plasmodium (Source 1).',
        backend: 'llama',
        askedAt: expect.any(String),
      },
    ]);
  });

  it('returns a no-results state without calling a backend', async () => {
    await activate(false);

    const outcome = await service.answer(session, { query: QUERY });

    if (!outcome.success) throw outcome.error;
    expect(outcome.value).toMatchObject({
      status: 'no_results',
      message: NO_RESULTS_MESSAGE,
      sources: [],
    });
    expect(createChatModel).not.toHaveBeenCalled();
    expect(session.history).toEqual([]);
  });

  it('requires an active index', async () => {
    const outcome = await service.answer(session, { query: QUERY });

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error.code).toBe('NO_ACTIVE_INDEX');
    expect(outcome.error.kind).toBe(RagErrorKind.CONFIGURATION);
  });

  it('uses the session template and fails on a malformed one', async () => {
    await activate(true);
    session.setQueryTemplate('Sans variable');

    const outcome = await service.answer(session, { query: QUERY });

    if (outcome.success) throw new Error('expected failure');
    expect(outcome.error.code).toBe('PROMPT_TEMPLATE_INVALID');
    expect(createChatModel).not.toHaveBeenCalled();
    expect(session.history).toEqual([]);
  });
});
