/**
 * @tessera/schemas - zod schemas and inferred types shared by every package
 */

export * from './field';
export * from './record';
export * from './enums';
export * from './crawl';
export * from './checkpoint';
