#!/usr/bin/env node

import dotenv from 'dotenv';

import { USAGE, parseCommandLine, type ParsedCommandLine } from './config';
import { ConfigError } from './errors';
import { createLogger } from './logger';
import { formatRecord } from './output';
import serve from './server';
import StreamTranscription from './transcription';

const USAGE_EXIT_CODE = 64;

async function main(): Promise<number> {
  dotenv.config();

  let parsed: ParsedCommandLine;
  try {
    parsed = parseCommandLine(process.argv.slice(2), process.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) { throw err; }
    console.error(`[error] ${err.message}`);
    console.error(USAGE);
    return USAGE_EXIT_CODE;
  }
  if (parsed.help) {
    console.log(USAGE);
    return 0;
  }

  const { config } = parsed;
  const logger = createLogger(config.verbosity);
  const transcriber = StreamTranscription.fromConfig(config, logger);

  logger.info(`Streaming from URL: ${config.streamUrl}`);
  logger.info(
    `Step: ${config.stepSeconds}s, Model: ${config.model}, Language: ${config.language}, ` +
    `Max Duration: ${config.maxDurationSeconds}s (press Ctrl+C to stop)`,
  );

  transcriber.on('record', ({ record }) => {
    const line = formatRecord(record, config.outputMode);
    if (line !== null) {
      console.log(line);
    }
  });

  const feed = config.port !== null ? serve(transcriber, config.port, logger) : null;
  if (feed) {
    await feed.listening;
  }

  const onSignal = () => transcriber.stop();
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const outcome = await transcriber.run();
    return outcome.exitCode;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (feed) {
      await feed.close();
    }
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
