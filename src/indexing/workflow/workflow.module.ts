import { Module } from '@nestjs/common';
import { IndexingWorkflowService } from './indexing-workflow.service';
import { VectorStoreModule } from '../../vector-store/vector-store.module';
import { ParseStage } from '../stages/parse';
import { LoadStage } from '../stages/load';
import { ChunkStage } from '../stages/chunk';
import { EmbedStage } from '../stages/embed';
import { PersistStage } from '../stages/persist';

@Module({
  imports: [VectorStoreModule],
  providers: [
    ParseStage,
    LoadStage,
    ChunkStage,
    PersistStage,
    EmbedStage,
    IndexingWorkflowService,
  ],
  exports: [IndexingWorkflowService],
})
export class WorkflowModule {}
