import Fastify from 'fastify';
import pino, { Logger } from 'pino';
import { Pool } from 'pg';
import { loadConfig } from './config.js';
import { BID_DIRECTIONS, BidDirection, TAX_MODES, TaxMode } from './domain.js';
import { MarketGenerationError } from './errors.js';
import { createMarketEngine } from './market.js';
import { MarketViewCache } from './marketCache.js';
import { createJsonRenderer, createMarketReport, isMarketTemplate, TemplateRenderer } from './report.js';
import { createPgDirectories } from './repository.js';

export type { Bid, MarketRow, MarketView, MarketQuery } from './domain.js';
export { MarketGenerationError, UnresolvableStationError } from './errors.js';

type MarketQuerystring = {
  bidType: BidDirection;
  station?: string;
  taxMode?: TaxMode;
  limit?: number;
};

const marketQuerySchema = {
  type: 'object',
  required: ['bidType'],
  properties: {
    bidType: { type: 'string', enum: BID_DIRECTIONS },
    station: { type: 'string' },
    taxMode: { type: 'string', enum: TAX_MODES },
    limit: { type: 'integer' },
  },
};

type ServiceOptions = {
  port?: number;
  host?: string;
  pool?: Pool;
  logger?: Logger;
  renderer?: TemplateRenderer;
  baseUrl?: string;
  adminBaseUrl?: string;
  cacheMaxEntries?: number;
  now?: () => Date;
};

export function createMarketService(options: ServiceOptions = {}) {
  const cfg = loadConfig();
  const logger = options.logger ?? pino({ level: cfg.logLevel });
  const app = Fastify({ logger });

  const PORT = options.port ?? cfg.port;
  const HOST = options.host ?? cfg.host;

  const pool = options.pool ?? new Pool({ connectionString: cfg.databaseUrl });
  const directories = createPgDirectories(pool);
  const engine = createMarketEngine({ directories, logger });
  const report = createMarketReport({
    engine,
    renderer: options.renderer ?? createJsonRenderer(),
    cache: new MarketViewCache(options.cacheMaxEntries ?? cfg.cacheMaxEntries),
    baseUrl: options.baseUrl ?? cfg.baseUrl,
    adminBaseUrl: options.adminBaseUrl ?? cfg.adminBaseUrl,
    now: options.now,
    logger,
  });

  app.get('/health', async () => ({ status: 'ok' }));

  app.get<{ Querystring: MarketQuerystring }>(
    '/api/market',
    { schema: { querystring: marketQuerySchema } },
    async (request, reply) => {
      const { bidType, station, taxMode, limit } = request.query;
      try {
        const data = await report.getMarketView({ direction: bidType, stationCode: station, taxMode, rowsLimit: limit });
        return reply.send({ data });
      } catch (err) {
        if (err instanceof MarketGenerationError) {
          return reply.code(422).send({ errors: err.diagnostics });
        }
        throw err;
      }
    }
  );

  app.get<{ Params: { template: string }; Querystring: MarketQuerystring }>(
    '/api/market/tables/:template',
    { schema: { querystring: marketQuerySchema } },
    async (request, reply) => {
      const { template } = request.params;
      if (!isMarketTemplate(template)) {
        return reply.code(404).send({ error: `unknown template ${template}` });
      }
      const { bidType, station, taxMode, limit } = request.query;
      const body = await report.renderMarketTable({
        template,
        direction: bidType,
        stationCode: station,
        taxMode,
        rowsLimit: limit,
      });
      return reply.type(report.contentType).send(body);
    }
  );

  app.post('/api/market/cache/invalidate', async () => {
    report.invalidate();
    logger.info('market cache invalidated');
    return { status: 'ok' };
  });

  return {
    app,
    report,
    async start() {
      await pool.query('SELECT 1'); // fail fast if DB not reachable
      const address = await app.listen({ port: PORT, host: HOST });
      logger.info({ address }, 'market-report started');
      return address;
    },
    async stop() {
      await app.close();
      await pool.end();
    },
  };
}

// Default start when not under test
if (process.env.NODE_ENV !== 'test') {
  createMarketService()
    .start()
    .catch((err) => {
      const logger = pino({ level: process.env.LOG_LEVEL || 'info' });
      logger.error({ err }, 'failed to start market-report');
      process.exit(1);
    });
}
