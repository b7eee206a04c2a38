#!/usr/bin/env node
import 'reflect-metadata';
import { container } from 'tsyringe';
import { loadConfig } from './config/app.config';
import { setupDI } from './config/di.setup';
import { RouteRiskService } from './services/route-risk.service';
import { AssessmentKind, RouteAssessment, RouteQuery } from './types/assessment.types';

const USAGE = 'Usage: route-risk <geopolitical|weather> <departurePort> <destinationPort> <YYYY-MM-DD> <carrier> <goodsType>';

export interface CliCommand {
  kind: AssessmentKind;
  query: RouteQuery;
}

export function parseArgs(args: readonly string[]): CliCommand {
  const [kind, departurePort, destinationPort, departureDate, carrierName, goodsType] = args;
  if (kind !== 'geopolitical' && kind !== 'weather') {
    throw new Error(`Unknown assessment kind: ${kind ?? '(none)'}\n${USAGE}`);
  }
  if (!departurePort || !destinationPort || !departureDate || !carrierName || !goodsType || args.length > 6) {
    throw new Error(USAGE);
  }
  return { kind, query: { departurePort, destinationPort, departureDate, carrierName, goodsType } };
}

export function runCommand(
  service: Pick<RouteRiskService, 'assessGeopoliticalRisk' | 'assessWeatherRisk'>,
  command: CliCommand
): Promise<RouteAssessment> {
  return command.kind === 'geopolitical'
    ? service.assessGeopoliticalRisk(command.query)
    : service.assessWeatherRisk(command.query);
}

async function main(): Promise<void> {
  try {
    const command = parseArgs(process.argv.slice(2));

    const config = loadConfig();
    await setupDI(config);

    const routeRisk = container.resolve(RouteRiskService);
    const assessment = await runCommand(routeRisk, command);

    console.log(JSON.stringify(assessment, null, 2));
    process.exit(0);
  } catch (error) {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
