import { Module } from '@nestjs/common';

import { GeocodingModule } from '../geocoding';
import { ScoringModule } from '../scoring';

import { RankingController } from './ranking.controller';
import { RankingService } from './ranking.service';

@Module({
  imports: [ScoringModule, GeocodingModule],
  controllers: [RankingController],
  providers: [RankingService],
  exports: [RankingService],
})
export class RankingModule {}
