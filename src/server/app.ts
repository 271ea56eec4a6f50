import path from 'node:path';
import express, { type NextFunction, type Request, type Response } from 'express';
import { errorMessage } from '@/core/errors';
import type { GenerateRequest, GenerateResult } from '@/core/generate';
import { getAllTraces, getRecentTraces } from '@/lib/debug/generationTrace';
import { getAll } from '@/lib/metrics';
import { parseSeed, randomSeed } from '@/lib/random';
import { errorPage, genPage, homePage } from './templates';

export type Generator = (req: GenerateRequest) => Promise<GenerateResult>;

export type AppOptions = {
  generate: Generator;
  /** Dossier où sont écrites puis servies les images */
  assetsDir: string;
  meta?: GenerateRequest['meta'];
  /** Expose /debug/metrics et /debug/traces */
  debug?: boolean;
};

class BadRequestError extends Error {
  readonly status = 400;
}

/**
 * Application HTTP: formulaire, génération par chemin ou par requête,
 * images servies sous /assets.
 */
export function createApp({ generate, assetsDir, meta, debug = false }: AppOptions): express.Express {
  const app = express();

  const render = async (seed: bigint, res: Response) => {
    const genName = `${seed}.gen.png`;
    const blurName = `${seed}.blur.png`;
    const { blurhash } = await generate({
      seed,
      genDest: path.join(assetsDir, genName),
      blurDest: path.join(assetsDir, blurName),
      meta,
    });
    res.type('html').send(
      genPage({ id: seed.toString(), blurhash, genUrl: `/assets/${genName}`, blurUrl: `/assets/${blurName}` }),
    );
  };

  const seedFrom = (raw: string): bigint => {
    const seed = parseSeed(raw);
    if (seed === null) throw new BadRequestError(`invalid id ${JSON.stringify(raw)}`);
    return seed;
  };

  app.get('/', (_req, res) => {
    res.type('html').send(homePage());
  });

  app.get('/gen/:id', (req, res, next) => {
    Promise.resolve()
      .then(() => render(seedFrom(req.params.id), res))
      .catch(next);
  });

  app.get('/gen', (req, res, next) => {
    const raw = req.query.id;
    Promise.resolve()
      .then(() => {
        if (raw === undefined || raw === '') return render(randomSeed(), res);
        if (typeof raw !== 'string') throw new BadRequestError('invalid id');
        return render(seedFrom(raw), res);
      })
      .catch(next);
  });

  app.use('/assets', express.static(assetsDir));

  if (debug) {
    app.get('/debug/metrics', (_req, res) => {
      res.json(getAll());
    });

    app.get('/debug/traces', (req, res) => {
      const raw = req.query.count;
      const count = typeof raw === 'string' ? Number(raw) : NaN;
      res.json(Number.isInteger(count) && count > 0 ? getRecentTraces(count) : getAllTraces());
    });
  }

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof BadRequestError ? err.status : 500;
    const message = errorMessage(err);
    console.error('[server] error handler:', status, message);
    res.status(status).type('html').send(errorPage(message));
  });

  return app;
}
