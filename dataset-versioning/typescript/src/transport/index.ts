export * from './http-transport.js';
export * from './downloader.js';
