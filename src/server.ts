import 'dotenv/config';
import express, { Request, Response } from 'express';
import { AdapterOverrides, createResolver, runWithConfig } from './core/adapterFactory';
import { AppConfig, fromEnv, mergeLayers, normalizeConfig, RawConfig, resolverSettings } from './core/config';
import { ConfigValidationError, PipelineError } from './core/errors';
import { PipelineResult } from './core/pipeline';
import { log } from './utils/logger';

// Settings a request body may override; credentials and rate limits stay server-side.
const BODY_KEYS = new Set(['baseAddress', 'searchRadiusMiles', 'minRatingsSource', 'searchKeywords', 'pageLimit']);

export const bodyToRaw = (body: unknown): RawConfig => {
  if (body === undefined || body === null) return {};
  if (typeof body !== 'object' || Array.isArray(body)) throw new ConfigValidationError('Body must be a JSON object');
  const raw: RawConfig = {};
  for (const [key, value] of Object.entries(body)) {
    if (!BODY_KEYS.has(key)) throw new ConfigValidationError(`${key} is not supported`);
    raw[key] = value;
  }
  return raw;
};

export interface AppOptions {
  baseConfig?: RawConfig;
  overrides?: AdapterOverrides;
  apiKey?: string;
  timeoutMs?: number;
  run?: (config: AppConfig, overrides: AdapterOverrides) => Promise<PipelineResult>;
}

export const createApp = ({
  baseConfig = fromEnv(),
  overrides = {},
  apiKey = process.env.API_KEY,
  timeoutMs = Number(process.env.REQUEST_TIMEOUT_MS || 600000),
  run = runWithConfig,
}: AppOptions = {}) => {
  // Concurrent requests geocode through one resolver so they queue on one rate limit.
  const shared: AdapterOverrides = { ...overrides, resolver: overrides.resolver ?? createResolver(resolverSettings(baseConfig)) };

  const app = express();
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_, res) => res.json({ ok: true, service: 'restaurant-leads' }));

  app.post('/leads', async (req: Request, res: Response) => {
    if (apiKey && req.header('x-api-key') !== apiKey) return res.status(401).json({ error: 'Unauthorized' });

    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;
    try {
      const config = normalizeConfig(mergeLayers(baseConfig, bodyToRaw(req.body)));
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error('Request timeout')), timeoutMs);
      });
      const result = await Promise.race([run(config, shared), timeoutPromise]);

      return res.json({
        success: true,
        outcome: result.outcome,
        origin: result.origin,
        candidatesFound: result.candidatesFound,
        uniqueCandidates: result.uniqueCandidates,
        leadsFound: result.leads.length,
        leads: result.leads,
        runtimeSeconds: Number(((Date.now() - started) / 1000).toFixed(2)),
      });
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        return res.status(400).json({ success: false, error: error.message });
      }
      if (error instanceof PipelineError) {
        return res.status(422).json({ success: false, code: error.code, error: error.message });
      }
      const message = error instanceof Error ? error.message : String(error);
      log('ERROR', 'lead pipeline request failed', message);
      return res.status(500).json({ success: false, error: message });
    } finally {
      if (timer) clearTimeout(timer);
    }
  });

  return app;
};

if (require.main === module) {
  const port = Number(process.env.PORT || 3000);
  const server = createApp().listen(port, () => log('INFO', `restaurant-leads listening on ${port}`));

  const shutdown = () => {
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
