import { Inject, Injectable, Logger } from '@nestjs/common';
import { HttpStatusError, TransportError } from './errors';
import { MAPTILER, type Maptiler } from './maptiler';
import { TileRequest } from './tile-request';
import { contentTypeForExtension, getDisplayName, getFileExtension, type TileSet } from './tileset';

export interface FetchedTile {
  buffer: Buffer;
  extension: string;
  contentType: string;
}

@Injectable()
export class TileFetcherService {
  private readonly logger = new Logger(TileFetcherService.name);

  constructor(
    @Inject(MAPTILER)
    private readonly maptiler: Maptiler,
  ) {}

  async fetchTile(tileSet: TileSet, x: number, y: number, zoom: number): Promise<FetchedTile> {
    const tileRequest = TileRequest.create(tileSet, x, y, zoom);
    const tileName = `${getDisplayName(tileSet)} ${zoom}/${x}/${y}`;

    this.logger.debug(`Fetching tile ${tileName}`);

    try {
      const buffer = await this.maptiler.createTileRequest(tileRequest).execute();
      const extension = getFileExtension(tileSet);

      return {
        buffer,
        extension,
        contentType: contentTypeForExtension(extension),
      };
    } catch (error) {
      if (error instanceof HttpStatusError) {
        this.logger.warn(`Tile ${tileName} rejected with HTTP ${error.status}`);
      } else if (error instanceof TransportError) {
        this.logger.error(`Tile ${tileName} failed: ${error.message}`);
      }
      throw error;
    }
  }
}
