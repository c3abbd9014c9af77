import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import cors from 'cors';
import { entryEarnings, periodSummary } from '../../src/domain/computations.js';
import { LedgerError, errorMessage } from '../../src/domain/errors.js';
import { roundCurrency } from '../../src/domain/format.js';
import type { Ledger } from '../../src/domain/ledger.js';
import { parseHours } from '../../src/domain/period.js';
import { describeRate, effectiveHourlyRate } from '../../src/domain/rateConfig.js';
import type { EntryInput, RateConfigInput } from '../../src/domain/types.js';
import { formatExport } from '../../src/export/exportFormatter.js';

export interface AppOptions {
  targetHours: number;
  now?: () => Date;
}

/** Malformed request body or query */
export class BadRequestError extends Error {}

const DEFAULT_RECENT_LIMIT = 10;

// --- Request parsing ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new BadRequestError(`${key} must be a string`);
  return value;
}

function parseEntryBody(body: unknown): EntryInput {
  if (!isRecord(body)) throw new BadRequestError('Expected a JSON object');

  const raw = body.hours;
  let hours: number;
  if (typeof raw === 'number') {
    hours = raw;
  } else if (typeof raw === 'string') {
    // Unparseable text falls through to the ledger's hours validation
    hours = parseHours(raw) ?? Number.NaN;
  } else {
    throw new BadRequestError('hours is required');
  }

  return { hours, date: optionalString(body, 'date'), note: optionalString(body, 'note') };
}

function parseRateBody(body: unknown): RateConfigInput {
  if (!isRecord(body)) throw new BadRequestError('Expected a JSON object');

  const input: RateConfigInput = {};
  for (const key of ['baseRate', 'avgTipRate'] as const) {
    const value = body[key];
    if (value === undefined) continue;
    if (typeof value !== 'number') throw new BadRequestError(`${key} must be a number`);
    input[key] = value;
  }
  if (body.includeTips !== undefined) {
    if (typeof body.includeTips !== 'boolean') throw new BadRequestError('includeTips must be a boolean');
    input.includeTips = body.includeTips;
  }
  return input;
}

function queryNumber(req: Request, key: string, fallback: number): number {
  const value = req.query[key];
  if (value === undefined) return fallback;
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : Number.NaN;
  if (!Number.isFinite(n)) throw new BadRequestError(`${key} must be a number`);
  return n;
}

function queryInteger(req: Request, key: string, fallback: number): number {
  const n = queryNumber(req, key, fallback);
  if (!Number.isInteger(n)) throw new BadRequestError(`${key} must be a whole number`);
  return n;
}

function queryFlag(req: Request, key: string): boolean {
  const value = req.query[key];
  return value === 'true' || value === '1';
}

// Express 4 does not forward rejected promises to the error handler on its own
function handle(fn: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
}

// body-parser rejections (oversized or unsupported bodies) carry their own 4xx status
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function statusFor(error: unknown): number {
  const clientStatus = clientErrorStatus(error);
  if (clientStatus !== null) return clientStatus;
  if (error instanceof BadRequestError || error instanceof SyntaxError) return 400;
  if (error instanceof LedgerError) return error.code === 'PERSISTENCE' ? 503 : 400;
  return 500;
}

export function createApp(ledger: Ledger, { targetHours, now = () => new Date() }: AppOptions): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.get('/ledger', (_req, res) => {
    res.json(ledger.snapshot());
  });

  // GET /summary?targetHours=N - totals and projection for the active period
  app.get('/summary', handle((req, res) => {
    const target = queryNumber(req, 'targetHours', targetHours);
    const config = ledger.rateConfig();
    const summary = periodSummary(ledger.activePeriod(), config, target);
    res.json({
      ...summary,
      actualEarnings: roundCurrency(summary.actualEarnings),
      projectedEarnings: roundCurrency(summary.projectedEarnings),
      effectiveRate: effectiveHourlyRate(config),
      rate: describeRate(config),
    });
  }));

  // GET /entries/recent?limit=N&includeClosed=true
  app.get('/entries/recent', handle((req, res) => {
    const limit = queryInteger(req, 'limit', DEFAULT_RECENT_LIMIT);
    res.json(ledger.recentEntries(limit, { includeClosed: queryFlag(req, 'includeClosed') }));
  }));

  // POST /entries - log hours into the active period
  app.post('/entries', handle(async (req, res) => {
    const entry = await ledger.logHours(parseEntryBody(req.body));
    res.status(201).json({ entry, earned: roundCurrency(entryEarnings(entry, ledger.rateConfig())) });
  }));

  // POST /periods - close the active period and start a new one
  app.post('/periods', handle(async (req, res) => {
    const body: unknown = req.body ?? {};
    if (!isRecord(body)) throw new BadRequestError('Expected a JSON object');
    const period = await ledger.startNewPeriod(optionalString(body, 'startDate'));
    res.status(201).json(period);
  }));

  app.get('/settings', (_req, res) => {
    const config = ledger.rateConfig();
    res.json({ ...config, effectiveRate: effectiveHourlyRate(config) });
  });

  // PUT /settings - "Save & Apply"
  app.put('/settings', handle(async (req, res) => {
    const config = await ledger.updateRateConfig(parseRateBody(req.body));
    res.json({ ...config, effectiveRate: effectiveHourlyRate(config) });
  }));

  // DELETE /data - clear every period and reset rates
  app.delete('/data', handle(async (_req, res) => {
    await ledger.clearAllData();
    res.status(204).end();
  }));

  app.get('/export', (_req, res) => {
    const { periods, rateConfig } = ledger.snapshot();
    res.type('text/plain').send(formatExport(periods, rateConfig, now()));
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(error);
    if (status >= 500) {
      console.error('[API] Request failed:', error);
    }
    res.status(status).json({ error: errorMessage(error) });
  });

  return app;
}
