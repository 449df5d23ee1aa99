import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MAPTILER, Maptiler } from './maptiler';
import { TileFetcherService } from './tile-fetcher.service';

@Module({})
export class MaptilerModule {
  static forRoot(): DynamicModule {
    return {
      module: MaptilerModule,
      providers: [
        {
          provide: MAPTILER,
          useFactory: (configService: ConfigService) =>
            new Maptiler(configService.getOrThrow<string>('maptiler.apiKey')),
          inject: [ConfigService],
        },
        TileFetcherService,
      ],
      exports: [MAPTILER, TileFetcherService],
    };
  }
}
