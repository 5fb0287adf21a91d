import { config } from './config.js';
import { errorText } from './errors.js';
import { createLogger } from './logger.js';
import { launch, type RunningServer } from './runtime.js';

const log = createLogger('server');

function handleSignals(running: RunningServer): void {
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    log.info(`${signal} received, shutting down`);
    running.stop().then(
      (final) => {
        log.info(`final stats: ${JSON.stringify(final)}`);
        process.exit(0);
      },
      (error: unknown) => {
        log.error(`shutdown failed: ${errorText(error)}`);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

const running = await launch(config, log);
if (running) handleSignals(running);
