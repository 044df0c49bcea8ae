// src/schema/index.ts

export * from './document';
export * from './config';

export const VERSION_MAP_STORE_FILE = 'versions.json';
export const VERSION_MAP_JINJA_FILE = 'versions.map.jinja';
