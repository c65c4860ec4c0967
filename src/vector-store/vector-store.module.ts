import { Module } from '@nestjs/common';
import { EmbeddingProviderFactory } from './embedding-provider.factory';

@Module({
  providers: [EmbeddingProviderFactory],
  exports: [EmbeddingProviderFactory],
})
export class VectorStoreModule {}
