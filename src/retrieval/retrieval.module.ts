import { Module } from '@nestjs/common';
import { SessionModule } from '../session';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { PromptController } from './prompt.controller';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { RetrievalController } from './retrieval.controller';
import { AnswerService } from './services/answer.service';
import { GenerationService } from './services/generation.service';
import { IndexLoader } from './services/index-loader.service';
import { PromptAssembler } from './services/prompt-assembler.service';
import { RetrieverService } from './services/retriever.service';

@Module({
  imports: [SessionModule, VectorStoreModule],
  controllers: [RetrievalController, PromptController],
  providers: [
    LLMProviderFactory,
    IndexLoader,
    RetrieverService,
    PromptAssembler,
    GenerationService,
    AnswerService,
  ],
  exports: [IndexLoader, AnswerService, PromptAssembler],
})
export class RetrievalModule {}
