import { Module } from '@nestjs/common';
import { MaptilerModule } from '@tilegate/maptiler';
import { TilesController } from './tiles.controller';

@Module({
  imports: [MaptilerModule.forRoot()],
  controllers: [TilesController],
})
export class TilesModule {}
