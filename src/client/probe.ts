#!/usr/bin/env node
import { errorText } from '../server/errors.js';
import { createLogger } from '../server/logger.js';
import { buildProbeScript, connectProbe } from './probe-client.js';

const log = createLogger('probe');
const url = process.argv[2] ?? `ws://localhost:${process.env.PORT ?? 5000}${process.env.WS_PATH ?? '/ws'}`;

async function main(): Promise<void> {
  const client = await connectProbe(url);
  log.info(`connected: ${JSON.stringify(await client.next())}`);
  for (const message of buildProbeScript(Date.now())) {
    client.send(message);
    log.info(`${String(message.type)} -> ${JSON.stringify(await client.next())}`);
  }
  await client.close();
}

main().catch((error: unknown) => {
  log.error(`probe failed: ${errorText(error)}`);
  process.exitCode = 1;
});
