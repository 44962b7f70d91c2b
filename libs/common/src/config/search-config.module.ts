import { Global, Inject, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import { loadSearchConfig } from './search-config.loader';
import { HARD_CONSTRAINTS, SearchConfig } from './search-config.types';

export const SEARCH_CONFIG = 'SEARCH_CONFIG';

export const InjectSearchConfig = (): ParameterDecorator => Inject(SEARCH_CONFIG);

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: SEARCH_CONFIG,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): SearchConfig => {
        const logger = new Logger('SearchConfigModule');
        const config = loadSearchConfig({
          overridesFile: configService.get<string>('SEARCH_CONFIG_FILE'),
          softConstraints: configService.get<string>('SEARCH_SOFT_CONSTRAINTS'),
        });

        const soft = HARD_CONSTRAINTS.filter((name) => !config.hardConstraints[name]);
        logger.log(
          `Search config loaded: ${Object.keys(config.poiCatalog).length} POI types, ` +
            `soft constraints: ${soft.length > 0 ? soft.join(', ') : 'none'}`,
        );

        return config;
      },
    },
  ],
  exports: [SEARCH_CONFIG],
})
export class SearchConfigModule {}
