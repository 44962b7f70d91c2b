import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { SearchConfigModule } from '@libs/common';

import { DataQualityModule } from './modules/data-quality';
import { GeocodingModule } from './modules/geocoding';
import { RankingModule } from './modules/ranking';
import { ScoringModule } from './modules/scoring';
import { AppController } from './app.controller';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
    }),
    SearchConfigModule,
    DataQualityModule,
    ScoringModule,
    GeocodingModule,
    RankingModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
