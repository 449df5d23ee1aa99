import { getDisplayName, type TileSet } from './tileset';

export type ArgumentErrorCode =
  | 'ZOOM_TOO_LARGE'
  | 'ZOOM_TOO_SMALL'
  | 'X_TOO_LARGE'
  | 'Y_TOO_LARGE'
  | 'INVALID_ARGUMENT';

/**
 * A tile request argument was out of range. Thrown before any network call.
 */
export abstract class ArgumentError extends Error {
  abstract readonly code: ArgumentErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ZoomTooLargeError extends ArgumentError {
  readonly code = 'ZOOM_TOO_LARGE';

  constructor(
    readonly zoom: number,
    readonly tileSet: TileSet,
    readonly maxZoom: number,
  ) {
    super(`Zoom level ${zoom} is too large for the tileset ${getDisplayName(tileSet)} (max: ${maxZoom})`);
  }
}

export class ZoomTooSmallError extends ArgumentError {
  readonly code = 'ZOOM_TOO_SMALL';

  constructor(
    readonly zoom: number,
    readonly tileSet: TileSet,
    readonly minZoom: number,
  ) {
    super(`Zoom level ${zoom} is too small for the tileset ${getDisplayName(tileSet)} (min: ${minZoom})`);
  }
}

export class XTooLargeError extends ArgumentError {
  readonly code = 'X_TOO_LARGE';

  constructor(
    readonly x: number,
    readonly zoom: number,
    readonly maxX: number,
  ) {
    super(`X coordinate ${x} is too large for the zoom level ${zoom} (max X: ${maxX})`);
  }
}

export class YTooLargeError extends ArgumentError {
  readonly code = 'Y_TOO_LARGE';

  constructor(
    readonly y: number,
    readonly zoom: number,
    readonly maxY: number,
  ) {
    super(`Y coordinate ${y} is too large for the zoom level ${zoom} (max Y: ${maxY})`);
  }
}

export type TileArgument = 'x' | 'y' | 'zoom';

export class InvalidTileArgumentError extends ArgumentError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    readonly argument: TileArgument,
    readonly value: number,
  ) {
    super(`${argument} must be a non-negative integer, got ${value}`);
  }
}

/**
 * The request was valid but executing it against the API failed.
 */
export abstract class MaptilerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends MaptilerError {
  constructor(cause: unknown) {
    super(`Server request failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class HttpStatusError extends MaptilerError {
  constructor(
    readonly status: number,
    readonly statusText = '',
  ) {
    super(`Server returned HTTP error code: ${statusText ? `${status} ${statusText}` : status}`);
  }
}
