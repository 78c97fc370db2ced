import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { errorMessage } from '../lib/errors.js';
import type { Downloader } from '../services/downloaderService.js';

interface StoreRoutesOptions {
  app: FastifyInstance;
  downloaders: ReadonlyMap<string, Downloader>;
}

const InstrumentListSchema = z.array(z.string().trim().min(1).max(128)).max(5_000);

const AddInstrumentsBodySchema = z.object({
  instruments: InstrumentListSchema.min(1),
});

const SyncRunBodySchema = z
  .object({
    instruments: InstrumentListSchema.min(1).optional(),
  })
  .nullish();

type GranularityParams = { granularity: string };

/**
 * Register the store control routes: index listing, instrument registration,
 * and sync run / stop / status per granularity.
 */
function registerStoreRoutes(options: StoreRoutesOptions): void {
  const { app, downloaders } = options;

  if (!app) {
    throw new Error('registerStoreRoutes requires app');
  }

  const findDownloader = (granularity: string): Downloader | null =>
    downloaders.get(String(granularity || '').toLowerCase()) ?? null;
  const unknownGranularity = (granularity: string) => ({ error: `Unknown granularity: ${granularity}` });

  app.get('/api/stores', async (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send({
      stores: Array.from(downloaders.values()).map((d) => ({
        granularity: d.granularity,
        period: d.store.period,
        directory: d.store.directory,
        running: d.isRunning,
      })),
    });
  });

  app.get<{ Params: GranularityParams }>('/api/stores/:granularity/index', async (req, res) => {
    const downloader = findDownloader(req.params.granularity);
    if (!downloader) return res.code(404).send(unknownGranularity(req.params.granularity));
    try {
      const rows = await downloader.loadIndex();
      return res.code(200).send({ granularity: downloader.granularity, instruments: rows });
    } catch (err: unknown) {
      req.log.error(`[store-routes] index load failed for ${downloader.granularity}: ${errorMessage(err)}`);
      return res.code(500).send({ error: 'Failed to load store index' });
    }
  });

  app.post<{ Params: GranularityParams }>('/api/stores/:granularity/instruments', async (req, res) => {
    const downloader = findDownloader(req.params.granularity);
    if (!downloader) return res.code(404).send(unknownGranularity(req.params.granularity));
    const parsed = AddInstrumentsBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.code(400).send({ error: 'Invalid request body', issues: parsed.error.issues.slice(0, 5) });
    }
    try {
      const added = await downloader.addInstruments(parsed.data.instruments);
      return res.code(200).send({ granularity: downloader.granularity, instruments: added });
    } catch (err: unknown) {
      return res.code(400).send({ error: errorMessage(err) });
    }
  });

  app.post<{ Params: GranularityParams }>('/api/stores/:granularity/sync/run', async (req, res) => {
    const downloader = findDownloader(req.params.granularity);
    if (!downloader) return res.code(404).send(unknownGranularity(req.params.granularity));
    const parsed = SyncRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.code(400).send({ error: 'Invalid request body', issues: parsed.error.issues.slice(0, 5) });
    }
    const started = downloader.sync(parsed.data?.instruments ?? null);
    if (started.status === 'already-running') {
      return res.code(409).send({ status: 'running' });
    }
    return res.code(202).send({ status: 'started' });
  });

  app.post<{ Params: GranularityParams }>('/api/stores/:granularity/sync/stop', async (req, res) => {
    const downloader = findDownloader(req.params.granularity);
    if (!downloader) return res.code(404).send(unknownGranularity(req.params.granularity));
    if (downloader.cancel()) {
      return res.code(202).send({ status: 'stop-requested' });
    }
    return res.code(409).send({ status: 'idle' });
  });

  app.get<{ Params: GranularityParams }>('/api/stores/:granularity/sync/status', async (req, res) => {
    const downloader = findDownloader(req.params.granularity);
    if (!downloader) return res.code(404).send(unknownGranularity(req.params.granularity));
    return res.code(200).send({ ...downloader.getStatus(), recent_messages: downloader.messages.recent(20) });
  });

  app.get('/healthz', async (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send({ status: 'ok', stores: downloaders.size });
  });
}

export { registerStoreRoutes };
export type { StoreRoutesOptions };
