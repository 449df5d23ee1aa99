export * from './tileset';
export * from './errors';
export * from './tile-request';
export * from './constructed-request';
export * from './maptiler';
export * from './tile-fetcher.service';
export * from './maptiler.module';
