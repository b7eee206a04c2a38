import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import cors from 'cors';
import { RequestCancelledError, RequestValidationError } from './errors/route-risk.errors';
import { errorHandler } from './middleware/error-handler';
import { RouteRiskService } from './services/route-risk.service';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler on its own
function asyncRoute(route: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    route(req, res).catch(next);
  };
}

/** The part of an HTTP response that tells whether the client went away. */
export interface ClosableResponse {
  readonly writableEnded: boolean;
  on(event: 'close', listener: () => void): unknown;
}

/** Aborts when the client disconnects before the response is written. */
export function disconnectSignal(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort(new RequestCancelledError('Client disconnected'));
    }
  });
  return controller.signal;
}

function queryParam(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function requireParam(value: unknown, name: string): string {
  const param = queryParam(value);
  if (param === undefined) {
    throw new RequestValidationError(`Invalid request: ${name} is required`, [`${name}: ${name} is required`]);
  }
  return param;
}

export function createApp(routeRisk: RouteRiskService): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.post('/api/assess/geopolitical', asyncRoute(async (req, res) => {
    const assessment = await routeRisk.assessGeopoliticalRisk(req.body, { signal: disconnectSignal(res) });
    res.json({ success: true, assessment });
  }));

  app.post('/api/assess/weather', asyncRoute(async (req, res) => {
    const assessment = await routeRisk.assessWeatherRisk(req.body, { signal: disconnectSignal(res) });
    res.json({ success: true, assessment });
  }));

  app.post('/api/mitigation', asyncRoute(async (req, res) => {
    const plan = await routeRisk.planMitigation(req.body, { signal: disconnectSignal(res) });
    res.json({ success: true, plan });
  }));

  app.get('/api/ports/search', (req, res) => {
    const query = requireParam(req.query.query, 'query');
    const limit = parseInt(queryParam(req.query.limit) ?? '10', 10);
    const matches = routeRisk.searchPorts(query, Number.isNaN(limit) ? 10 : limit);
    res.json({ success: true, matches });
  });

  app.get('/api/countries/:country/risk-profile', (req, res) => {
    const report = routeRisk.countryRiskProfile(req.params.country, queryParam(req.query.goodsType));
    res.json({ success: true, ...report });
  });

  app.get('/api/routes/hazards', (req, res) => {
    const report = routeRisk.routeHazards(
      requireParam(req.query.departurePort, 'departurePort'),
      requireParam(req.query.destinationPort, 'destinationPort'),
      queryParam(req.query.goodsType)
    );
    res.json({ success: true, ...report });
  });

  // Health check endpoint
  app.get('/health', asyncRoute(async (_req, res) => {
    res.json(await routeRisk.healthCheck());
  }));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
