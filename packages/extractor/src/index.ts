import 'dotenv/config';
import pino from 'pino';
import { loadClientConfig, loadExtractorConfig } from './config';
import { closeDb } from './db/client';
import { runExtractor } from './extraction/orchestrator';

const logger = pino({ transport: { target: 'pino-pretty' } });

async function main() {
  logger.info('Amplitude extractor starting');

  try {
    const clientConfig = loadClientConfig(process.env);
    const config = loadExtractorConfig(process.env);
    logger.info({ mode: config.mode, job: config.job }, 'Configuration loaded');

    const outcome = await runExtractor(config, clientConfig, logger);

    if (outcome.mode === 'export') {
      logger.info(outcome.summary, `Exported ${outcome.summary.exported.toLocaleString('en-US')} events`);
    } else {
      const { summary } = outcome;
      logger.info(summary, `Identify finished: ${summary.succeededChunks}/${summary.chunks} chunks sent`);
      if (summary.failedChunks > 0) {
        logger.warn({ failures: summary.failures }, 'Some identify chunks failed');
      }
    }
  } catch (err) {
    logger.error(err, 'Extractor failed');
    process.exitCode = 1;
  } finally {
    await closeDb();
  }
}

main().catch(err => {
  logger.error(err, 'Extractor crashed');
  process.exit(1);
});
