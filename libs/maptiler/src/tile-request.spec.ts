import {
  ArgumentError,
  InvalidTileArgumentError,
  XTooLargeError,
  YTooLargeError,
  ZoomTooLargeError,
  ZoomTooSmallError,
} from './errors';
import { maxCoordinateForZoom, TileRequest } from './tile-request';
import { BUILT_IN_TILESETS, customTileSet, getMaxZoom, getMinZoom } from './tileset';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('TileRequest', () => {
  it('rejects a zoom below the tileset minimum', () => {
    const error = captureError(() => TileRequest.create('Outdoor', 0, 0, 2));

    expect(error).toBeInstanceOf(ZoomTooSmallError);
    expect(error).toMatchObject({ zoom: 2, tileSet: 'Outdoor', minZoom: 5 });
    expect(error).toHaveProperty('message', 'Zoom level 2 is too small for the tileset Outdoor (min: 5)');
  });

  it('rejects a zoom above the tileset maximum', () => {
    const error = captureError(() => TileRequest.create('Satellite', 0, 0, 21));

    expect(error).toBeInstanceOf(ZoomTooLargeError);
    expect(error).toMatchObject({ zoom: 21, tileSet: 'Satellite', maxZoom: 20 });
    expect(error).toHaveProperty('message', 'Zoom level 21 is too large for the tileset Satellite (max: 20)');
  });

  it('rejects an x coordinate beyond the zoom bound', () => {
    const error = captureError(() => TileRequest.create('Satellite', 5, 0, 2));

    expect(error).toBeInstanceOf(XTooLargeError);
    expect(error).toMatchObject({ x: 5, zoom: 2, maxX: 4 });
  });

  it('rejects a y coordinate beyond the zoom bound', () => {
    const error = captureError(() => TileRequest.create('Satellite', 5, 10, 3));

    expect(error).toBeInstanceOf(YTooLargeError);
    expect(error).toMatchObject({ y: 10, zoom: 3, maxY: 8 });
    expect(error).toHaveProperty('message', 'Y coordinate 10 is too large for the zoom level 3 (max Y: 8)');
  });

  it('checks x before y', () => {
    expect(captureError(() => TileRequest.create('Satellite', 9, 9, 3))).toBeInstanceOf(XTooLargeError);
  });

  it('accepts the single world tile at zoom 0', () => {
    const request = TileRequest.create('Satellite', 0, 0, 0);

    expect(request).toMatchObject({ tileSet: 'Satellite', zoom: 0, x: 0, y: 0 });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('rejects coordinate 1 at zoom 0', () => {
    expect(captureError(() => TileRequest.create('Satellite', 1, 0, 0))).toMatchObject({ x: 1, zoom: 0, maxX: 0 });
  });

  it.each([1, 2, 3, 10, 20])('accepts 2^%i and rejects one more', (zoom) => {
    const max = maxCoordinateForZoom(zoom);
    expect(max).toBe(2 ** zoom);

    expect(TileRequest.create('Satellite', max, max, zoom)).toMatchObject({ x: max, y: max });
    expect(captureError(() => TileRequest.create('Satellite', max + 1, 0, zoom))).toBeInstanceOf(XTooLargeError);
    expect(captureError(() => TileRequest.create('Satellite', 0, max + 1, zoom))).toBeInstanceOf(YTooLargeError);
  });

  it('enforces each built-in zoom range at its edges', () => {
    for (const tileSet of BUILT_IN_TILESETS) {
      const minZoom = getMinZoom(tileSet);
      const maxZoom = getMaxZoom(tileSet);

      expect(TileRequest.create(tileSet, 0, 0, minZoom).zoom).toBe(minZoom);
      expect(TileRequest.create(tileSet, 0, 0, maxZoom).zoom).toBe(maxZoom);
      expect(captureError(() => TileRequest.create(tileSet, 0, 0, maxZoom + 1))).toMatchObject({
        zoom: maxZoom + 1,
        tileSet,
        maxZoom,
      });
      if (minZoom > 0) {
        expect(captureError(() => TileRequest.create(tileSet, 0, 0, minZoom - 1))).toMatchObject({
          zoom: minZoom - 1,
          tileSet,
          minZoom,
        });
      }
    }
  });

  it('accepts custom tilesets between zoom 0 and 20', () => {
    const foo = customTileSet('foo', 'bar');

    expect(TileRequest.create(foo, 0, 0, 0).tileSet).toBe(foo);
    expect(captureError(() => TileRequest.create(foo, 0, 0, 21))).toBeInstanceOf(ZoomTooLargeError);
  });

  it.each([
    ['x', -1, 0, 3],
    ['y', 0, 1.5, 3],
    ['zoom', 0, 0, Number.NaN],
  ] as const)('rejects a non-integer or negative %s', (argument, x, y, zoom) => {
    const error = captureError(() => TileRequest.create('Satellite', x, y, zoom));

    expect(error).toBeInstanceOf(InvalidTileArgumentError);
    expect(error).toBeInstanceOf(ArgumentError);
    expect(error).toHaveProperty('argument', argument);
  });
});
