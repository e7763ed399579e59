#!/usr/bin/env node
/**
 * Spread Hedger command line entry point
 */

import { ConfigurationManager, EngineConfig, primarySymbol, secondarySymbol } from './config/ConfigurationManager';
import { SyntheticBookFeed } from './connectors/venues/SyntheticBookFeed';
import { Engine, VenuePair, createEngine, createVenues } from './services/EngineFactory';
import { checkSpreads, formatSpreadCheck } from './services/SpreadCheck';
import { ControlServer } from './web/server';
import { createConsoleSink } from './utils/consoleSink';
import { ApplicationError, errorMessage } from './utils/ErrorHandler';

export interface CliOptions {
  configPath?: string;
  check: boolean;
  help: boolean;
}

export const USAGE = [
  'Usage: spread-hedger [--config <path>] [--check]',
  '',
  '  --config <path>  engine configuration file (default ./config/engine.json)',
  '  --check          print both venues\' top of book and spread difference, then exit',
  '  --help           show this message'
].join('\n');

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { check: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--check':
        options.check = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--config': {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith('--')) {
          throw new Error('--config requires a path');
        }
        options.configPath = value;
        i++;
        break;
      }
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return options;
}

/**
 * Starts the synthetic market for paper venues; returns the function that stops it
 */
function startPaperMarket(venues: VenuePair, config: EngineConfig): () => void {
  if (venues.mode !== 'paper') {
    return () => undefined;
  }

  const { primary, secondary } = venues;
  const feed = new SyntheticBookFeed();
  const tick = (): void => feed.tick(primary, primarySymbol(config), secondary, secondarySymbol(config));
  tick();
  const timer = setInterval(tick, config.trading.cycleIntervalMs);
  return () => clearInterval(timer);
}

async function runCheck(engine: Engine): Promise<void> {
  const result = await checkSpreads(
    engine.venues.primary,
    primarySymbol(engine.config),
    engine.venues.secondary,
    secondarySymbol(engine.config)
  );
  for (const line of formatSpreadCheck(result)) {
    console.log(line);
  }
}

async function runEngine(engine: Engine, stopMarket: () => void): Promise<void> {
  const { config, loop, auditService } = engine;

  let control: ControlServer | undefined;
  if (config.control.enabled) {
    control = new ControlServer(loop, auditService, config.control);
    const address = await control.start();
    console.log(`Control server listening on http://${address.address}:${address.port}/api/health`);
  }

  const requestStop = (signal: NodeJS.Signals): void => {
    console.log(`\nReceived ${signal}, cancelling resting orders...`);
    loop.stop().catch(error => {
      console.error('Shutdown failed:', errorMessage(error));
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', requestStop);
  process.once('SIGTERM', requestStop);

  try {
    await loop.start();
  } finally {
    process.off('SIGINT', requestStop);
    process.off('SIGTERM', requestStop);
    stopMarket();
    await control?.stop();
  }

  if (loop.getStatus().unhedgedBacklog.length > 0) {
    console.error('Stopped with unhedged fills; flatten the secondary venue by hand');
    process.exitCode = 2;
  }
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const options = parseArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = await new ConfigurationManager(options.configPath).loadConfiguration();
  const venues = createVenues(config);
  const engine = createEngine(config, venues);
  engine.auditService.subscribe(createConsoleSink(config.logLevel));
  engine.auditService.logEvent('CONFIG_LOAD', {
    environment: config.environment,
    mode: config.venues.mode,
    trading: config.trading,
    hedge: config.hedge,
    risk: config.risk
  });

  const stopMarket = startPaperMarket(venues, config);
  if (options.check) {
    try {
      await runCheck(engine);
    } finally {
      stopMarket();
    }
    return;
  }

  await runEngine(engine, stopMarket);
}

if (require.main === module) {
  main().catch(error => {
    if (error instanceof ApplicationError) {
      console.error(`${error.name}: ${error.message}`);
      for (const action of error.suggestedActions) {
        console.error(`  - ${action}`);
      }
    } else {
      console.error(errorMessage(error));
    }
    process.exitCode = 1;
  });
}
