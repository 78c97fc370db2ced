import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';

import type { Granularity } from './lib/chunkCalendar.js';
import { registerStoreRoutes } from './routes/storeRoutes.js';
import { Downloader } from './services/downloaderService.js';
import type { DownloaderOptions } from './services/downloaderService.js';

interface BuildAppOptions {
  downloaders: ReadonlyMap<string, Downloader>;
  /** Pino level for request logging; `false` disables it. */
  logLevel?: string | false;
}

function buildApp(options: BuildAppOptions): FastifyInstance {
  const { downloaders, logLevel = 'info' } = options;
  const app = Fastify({ logger: logLevel === false ? false : { level: logLevel } });
  registerStoreRoutes({ app, downloaders });
  return app;
}

/** One Downloader per granularity, all sharing the same root and engine settings. */
function createDownloaders(
  granularities: readonly Granularity[],
  shared: Omit<DownloaderOptions, 'granularity'>,
): Map<string, Downloader> {
  const downloaders = new Map<string, Downloader>();
  for (const granularity of granularities) {
    downloaders.set(granularity, new Downloader({ ...shared, granularity }));
  }
  return downloaders;
}

export { buildApp, createDownloaders };
export type { BuildAppOptions };
