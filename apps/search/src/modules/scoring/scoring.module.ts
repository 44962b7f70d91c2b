import { Module } from '@nestjs/common';

import { DataQualityModule } from '../data-quality';

import {
  AssetTypeGate,
  AvoidLocationGate,
  AvoidPoiGate,
  MustHavePoiGate,
  NiceToHaveGate,
  PetPolicyGate,
  PriceRangeGate,
  RapidTransitGate,
  TargetLocationGate,
  TransportModeGate,
} from './gates';
import { CandidateAttributesMapper, IntentMapper } from './mappers';
import { ScoringController } from './scoring.controller';
import { StructuredScorerService } from './structured-scorer.service';

@Module({
  imports: [DataQualityModule],
  controllers: [ScoringController],
  providers: [
    StructuredScorerService,
    CandidateAttributesMapper,
    IntentMapper,
    AssetTypeGate,
    TransportModeGate,
    RapidTransitGate,
    MustHavePoiGate,
    PetPolicyGate,
    NiceToHaveGate,
    AvoidPoiGate,
    PriceRangeGate,
    TargetLocationGate,
    AvoidLocationGate,
  ],
  exports: [StructuredScorerService, CandidateAttributesMapper, IntentMapper, DataQualityModule],
})
export class ScoringModule {}
