import { ConstructedRequest, tileRequestType, type RequestType } from './constructed-request';
import { TileRequest } from './tile-request';

/**
 * A MapTiler Cloud session. Holds the API key and hands out requests bound to it.
 *
 * @example
 * const maptiler = new Maptiler(process.env.MAPTILER_KEY ?? '');
 * const tile = TileRequest.create('Satellite', 2, 1, 2);
 * const jpeg = await maptiler.createRequest(tile).execute();
 */
export class Maptiler {
  constructor(private readonly apiKey: string) {}

  createRequest(request: TileRequest | RequestType): ConstructedRequest {
    const inner = request instanceof TileRequest ? tileRequestType(request) : request;
    return new ConstructedRequest(this.apiKey, inner);
  }

  createTileRequest(tileRequest: TileRequest): ConstructedRequest {
    return new ConstructedRequest(this.apiKey, tileRequestType(tileRequest));
  }
}

export const MAPTILER = Symbol('MAPTILER');
