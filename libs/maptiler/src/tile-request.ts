import {
  InvalidTileArgumentError,
  XTooLargeError,
  YTooLargeError,
  ZoomTooLargeError,
  ZoomTooSmallError,
  type TileArgument,
} from './errors';
import { getMaxZoom, getMinZoom, type TileSet } from './tileset';

/**
 * Largest x or y accepted at a zoom level.
 *
 * At zoom 0 the world is a single tile. Above that the bound is `2^zoom`,
 * which is one more than the last tile index of a `2^zoom` x `2^zoom` grid;
 * the API answers those requests with an error status.
 */
export function maxCoordinateForZoom(zoom: number): number {
  if (zoom === 0) {
    return 0;
  }
  return 2 ** zoom;
}

function assertTileInteger(argument: TileArgument, value: number): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidTileArgumentError(argument, value);
  }
}

/**
 * A validated tile address in the
 * [Tiled Web Map](https://en.wikipedia.org/wiki/Tiled_web_map) scheme.
 * Only {@link TileRequest.create} builds one, so every instance is in bounds
 * for its tileset.
 */
export class TileRequest {
  private constructor(
    readonly tileSet: TileSet,
    readonly zoom: number,
    readonly x: number,
    readonly y: number,
  ) {
    Object.freeze(this);
  }

  /**
   * @throws {ArgumentError} when the zoom is outside the tileset's range or
   * a coordinate is beyond the zoom level's bound
   */
  static create(tileSet: TileSet, x: number, y: number, zoom: number): TileRequest {
    assertTileInteger('x', x);
    assertTileInteger('y', y);
    assertTileInteger('zoom', zoom);

    const maxZoom = getMaxZoom(tileSet);
    const minZoom = getMinZoom(tileSet);

    if (zoom > maxZoom) {
      throw new ZoomTooLargeError(zoom, tileSet, maxZoom);
    }
    if (zoom < minZoom) {
      throw new ZoomTooSmallError(zoom, tileSet, minZoom);
    }

    const maxCoordinate = maxCoordinateForZoom(zoom);

    if (x > maxCoordinate) {
      throw new XTooLargeError(x, zoom, maxCoordinate);
    }
    if (y > maxCoordinate) {
      throw new YTooLargeError(y, zoom, maxCoordinate);
    }

    return new TileRequest(tileSet, zoom, x, y);
  }
}
