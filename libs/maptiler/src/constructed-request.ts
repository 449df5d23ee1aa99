import { HttpStatusError, TransportError } from './errors';
import type { TileRequest } from './tile-request';
import { getEndpoint, getFileExtension } from './tileset';

const MAPTILER_TILES_API = 'https://api.maptiler.com/tiles';

export type RequestType = { kind: 'tile'; tileRequest: TileRequest };

export function tileRequestType(tileRequest: TileRequest): RequestType {
  return { kind: 'tile', tileRequest };
}

/**
 * e.g. https://api.maptiler.com/tiles/satellite/{z}/{x}/{y}.jpg?key={apiKey}
 */
export function buildTileUrl(apiKey: string, tileRequest: TileRequest): string {
  const { tileSet, zoom, x, y } = tileRequest;
  const endpoint = getEndpoint(tileSet);
  const extension = getFileExtension(tileSet);

  return `${MAPTILER_TILES_API}/${endpoint}/${zoom}/${x}/${y}.${extension}?key=${apiKey}`;
}

/**
 * A request bound to the API key of the session that created it. Each
 * {@link execute} call is a separate HTTP request.
 */
export class ConstructedRequest {
  constructor(
    private readonly apiKey: string,
    readonly request: RequestType,
  ) {
    Object.freeze(this);
  }

  async execute(): Promise<Buffer> {
    switch (this.request.kind) {
      case 'tile':
        return this.executeTile(this.request.tileRequest);
    }
  }

  private async executeTile(tileRequest: TileRequest): Promise<Buffer> {
    const url = buildTileUrl(this.apiKey, tileRequest);

    let response: Response;
    try {
      response = await fetch(url);
    } catch (error) {
      throw new TransportError(error);
    }

    if (response.status !== 200) {
      await response.body?.cancel();
      throw new HttpStatusError(response.status, response.statusText);
    }

    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw new TransportError(error);
    }
  }
}
