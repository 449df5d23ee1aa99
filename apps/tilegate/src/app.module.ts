import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { maptilerConfig, validate } from '@tilegate/config';
import { AppController } from './app.controller';
import { TilesModule } from './tiles/tiles.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [maptilerConfig],
      validate,
    }),
    TilesModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
