import 'reflect-metadata';
import { container } from 'tsyringe';
import { loadConfig } from './config/app.config';
import { setupDI } from './config/di.setup';
import { createApp } from './app';
import { RouteRiskService } from './services/route-risk.service';

async function main(): Promise<void> {
  const config = loadConfig();
  await setupDI(config);

  // One instance for the process so the assessment cache is shared between requests
  const routeRisk = container.resolve(RouteRiskService);
  const app = createApp(routeRisk);
  const port = config.server.port;

  app.listen(port, () => {
    console.log(`API Server running on http://localhost:${port}`);
    console.log(`Health check: http://localhost:${port}/health`);
  });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
