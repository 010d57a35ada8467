#!/usr/bin/env node
import { SystemClock } from '../common/Clock';
import { createLogger, HarnessLogger } from '../common/logger';
import { parseAddress } from '../common/utils';
import { HarnessConfig, loadConfigFile, resolveConfig } from '../config/HarnessConfig';
import { runClient } from '../harness/ClientRole';
import { runServer } from '../harness/ServerRole';
import { formatReport } from '../stats/report';
import { NetClientTransport } from '../transport/adapters/NetClientTransport';
import { NetServerTransport } from '../transport/adapters/NetServerTransport';
import { HELP_TEXT, parseArgs, UsageError } from './args';

async function runRole(config: HarnessConfig, logger: HarnessLogger): Promise<number> {
  const clock = new SystemClock();
  const address = parseAddress(config.address);
  const durationMs = config.durationSeconds * 1000;

  if (config.role === 'server') {
    const transport = await NetServerTransport.listen({ ...address, logger: logger.child('transport') });
    try {
      const result = await runServer({
        transport,
        durationMs,
        tickRate: config.tickRate,
        clock,
        logger: logger.child('server')
      });
      console.log(formatReport(result.stats));
      return 0;
    } finally {
      await transport.close();
    }
  }

  const transport = await NetClientTransport.connect({ ...address, logger: logger.child('transport') });
  try {
    const result = await runClient({
      transport,
      durationMs,
      tickRate: config.tickRate,
      sendRate: config.sendRate,
      clock,
      logger: logger.child('client')
    });
    console.log(formatReport(result.stats));
    return result.scheduler.aborted ? 1 : 0;
  } finally {
    await transport.close();
  }
}

export async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv);
  if (args.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  const fileConfig = args.configPath ? await loadConfigFile(args.configPath) : {};
  const config = resolveConfig(fileConfig, args.overrides);
  const logger = createLogger({ level: config.logLevel, enableTestMode: false });

  logger.info(`Starting ${config.role} on ${config.address} for ${config.durationSeconds}s`);
  return runRole(config, logger);
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      console.error(message);
      if (error instanceof UsageError) {
        console.error(HELP_TEXT);
        process.exitCode = 2;
        return;
      }
      process.exitCode = 1;
    });
}
