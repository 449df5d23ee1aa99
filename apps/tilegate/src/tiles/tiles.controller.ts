import { Controller, Get, NotFoundException, Param, Query, StreamableFile } from '@nestjs/common';
import {
  BUILT_IN_TILESETS,
  TileFetcherService,
  describeTileSet,
  resolveTileSet,
  type TileSetDescription,
} from '@tilegate/maptiler';
import { TileParamsDto } from './dto/tile-params.dto';
import { TileQueryDto } from './dto/tile-query.dto';

@Controller('tiles')
export class TilesController {
  constructor(private readonly tileFetcher: TileFetcherService) {}

  @Get()
  list(): TileSetDescription[] {
    return BUILT_IN_TILESETS.map((tileSet) => describeTileSet(tileSet));
  }

  @Get(':tileset/:z/:x/:y')
  async getTile(@Param() params: TileParamsDto, @Query() query: TileQueryDto): Promise<StreamableFile> {
    const tileSet = resolveTileSet(params.tileset, query.extension);
    if (!tileSet) {
      throw new NotFoundException(`Unknown tileset: ${params.tileset}`);
    }

    const tile = await this.tileFetcher.fetchTile(tileSet, params.x, params.y, params.z);

    return new StreamableFile(tile.buffer, {
      type: tile.contentType,
      length: tile.buffer.length,
    });
  }
}
