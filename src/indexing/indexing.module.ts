import { Module } from '@nestjs/common';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { SessionModule } from '../session';
import { IndexingController } from './indexing.controller';
import { IndexingService } from './indexing.service';
import { WorkflowModule } from './workflow/workflow.module';

@Module({
  imports: [WorkflowModule, RetrievalModule, SessionModule],
  controllers: [IndexingController],
  providers: [IndexingService],
  exports: [IndexingService],
})
export class IndexingModule {}
