import { Module } from '@nestjs/common';
import { ElasticModule } from '../../libs/common/src/elastic';
import { HistoryController } from './history.controller';
import { HistoryService } from './history.service';

@Module({
  imports: [ElasticModule],
  controllers: [HistoryController],
  providers: [HistoryService],
})
export class HistoryModule {}
