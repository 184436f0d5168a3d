/**
 * Telemetry API - the device's CGI endpoints on top of a TelemetrySource.
 * No authentication: the real firmware trusts its LAN and so does this.
 */

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { ValidationError } from '../common/errors';
import { TelemetrySource } from '../modules/emulator_state';
import { minerConfSchema, toDomainSettings } from './schemas';

export const STATUS_PATH = '/cgi-bin/get_miner_status.cgi';
export const CONF_PATH = '/cgi-bin/set_miner_conf.cgi';

interface BodyParserError {
  status: number;
  type: string;
  message: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    'type' in error &&
    typeof error.type === 'string'
  );
}

export function createTelemetryApp(source: TelemetrySource): express.Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(cors());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      service: 'asic-emulator-telemetry',
      ...source.describe(),
      timestamp: new Date().toISOString()
    });
  });

  app.get(STATUS_PATH, (_req: Request, res: Response) => {
    try {
      res.json(source.snapshot().document);
    } catch (error) {
      console.error('Error building miner status:', error);
      res.status(500).json({ error: String(error) });
    }
  });

  app.post(
    CONF_PATH,
    express.json({ type: () => true, limit: '16kb' }),
    (req: Request, res: Response) => {
      const validation = minerConfSchema.safeParse(req.body);

      if (!validation.success) {
        const error = new ValidationError(
          'Validation Error',
          validation.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
        );
        return res.status(400).json({ success: false, message: error.message, details: error.issues });
      }

      try {
        const applied = source.configure(toDomainSettings(validation.data), `api:${req.ip ?? 'unknown'}`);
        return res.json({ success: true, message: `Configuration updated (${applied.name})` });
      } catch (error) {
        console.error('Error in set_miner_conf:', error);
        return res.status(500).json({ success: false, message: String(error) });
      }
    }
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).end();
  });

  // Malformed JSON lands here from express.json()
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
      return res.status(error.status).json({ success: false, message: error.message });
    }
    console.error('Unhandled telemetry API error:', error);
    return res.status(500).json({ error: 'Internal Server Error' });
  });

  return app;
}
