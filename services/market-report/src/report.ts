import { format } from 'date-fns';
import pino, { Logger } from 'pino';
import type { BidDirection, MarketQuery, MarketView, Station, TaxMode } from './domain.js';
import { MarketGenerationError } from './errors.js';
import { normalizeStationCode, type MarketEngine, type MarketSnapshot } from './market.js';
import type { MarketViewCache } from './marketCache.js';
import { truncateMarketView } from './ranking.js';

export const MARKET_TEMPLATES = [
  'market-table',
  'market-table-download',
  'market-table-email-inside',
  'market-table-admin',
  'market-table-site',
  'market-table-site-v2',
] as const;

export type MarketTemplate = (typeof MARKET_TEMPLATES)[number];

export function isMarketTemplate(value: string): value is MarketTemplate {
  return MARKET_TEMPLATES.some((template) => template === value);
}

export type MarketTemplateData = {
  currentDate: string;
  station: Station | null;
  baseUrl: string;
  adminBaseUrl: string;
  bids: MarketView;
  bidType: BidDirection;
  taxMode?: TaxMode;
};

export type ErrorTemplateData = {
  errors: string[];
};

export type RenderRequest =
  | { template: `tables.${MarketTemplate}`; data: MarketTemplateData }
  | { template: 'tables.error'; data: ErrorTemplateData };

/** Turns template data into the document sent to the client. */
export interface TemplateRenderer {
  readonly contentType: string;
  render(request: RenderRequest): string | Promise<string>;
}

// Hands the template name and data to a front end that owns the markup.
export function createJsonRenderer(): TemplateRenderer {
  return {
    contentType: 'application/json; charset=utf-8',
    render: (request) => JSON.stringify(request),
  };
}

export type MarketTableRequest = MarketQuery & { template: MarketTemplate };

type ReportOptions = {
  engine: Pick<MarketEngine, 'computeMarket'>;
  renderer: TemplateRenderer;
  cache?: MarketViewCache;
  baseUrl: string;
  adminBaseUrl: string;
  now?: () => Date;
  logger?: Logger;
};

export type MarketReport = ReturnType<typeof createMarketReport>;

export function createMarketReport(options: ReportOptions) {
  const logger = options.logger ?? pino({ level: process.env.LOG_LEVEL || 'info' });
  const { engine, renderer, cache } = options;
  const now = options.now ?? (() => new Date());

  /**
   * Views without a destination go through the cache untruncated; the row
   * limit is applied per request. Views for a destination are always fresh.
   */
  async function loadMarket(query: MarketQuery): Promise<MarketSnapshot> {
    const stationCode = normalizeStationCode(query.stationCode);
    if (stationCode || !cache) {
      return engine.computeMarket({ ...query, stationCode });
    }
    const { direction, taxMode } = query;
    const view = await cache.getOrCompute({ direction, taxMode }, async () => {
      const market = await engine.computeMarket({ direction, taxMode });
      return market.view;
    });
    return { view: truncateMarketView(view, query.rowsLimit), station: null };
  }

  async function getMarketView(query: MarketQuery): Promise<MarketView> {
    const { view } = await loadMarket(query);
    return view;
  }

  async function buildTemplateData(query: MarketQuery): Promise<MarketTemplateData> {
    const { view: bids, station } = await loadMarket(query);
    return {
      currentDate: format(now(), 'dd.MM.yy'),
      station,
      baseUrl: options.baseUrl,
      adminBaseUrl: options.adminBaseUrl,
      bids,
      bidType: query.direction,
      taxMode: query.taxMode,
    };
  }

  async function renderMarketTable(request: MarketTableRequest): Promise<string> {
    const { template, ...query } = request;
    let data: MarketTemplateData;
    try {
      data = await buildTemplateData(query);
    } catch (err) {
      if (!(err instanceof MarketGenerationError)) throw err;
      logger.warn({ stationCode: query.stationCode, errors: err.diagnostics }, 'market table replaced by error page');
      return renderer.render({ template: 'tables.error', data: { errors: err.diagnostics } });
    }
    return renderer.render({ template: `tables.${template}`, data });
  }

  return {
    getMarketView,
    renderMarketTable,
    contentType: renderer.contentType,
    invalidate() {
      cache?.invalidate();
    },
  };
}
