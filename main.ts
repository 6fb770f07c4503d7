#!/usr/bin/env node
import { createServer } from 'node:net';
import { loadConfig } from './config';
import { formatAddress } from './probe/transport';
import { coerceErrorString } from './transport/errors';
import { ControlServer, listen } from './transport/server';

async function main() {
  const config = loadConfig(process.env);
  const server = new ControlServer(createServer(), config.serverOptions);
  server.bindLogger(config.logFn, config.logLevel);

  const bound = await listen(server.server, config.controlAddress);
  server.log?.info(`control server listening on ${formatAddress(bound)}`);

  const shutdown = new AbortController();
  process.once('SIGINT', () => {
    server.log?.info(`received SIGINT, shutting down`);
    shutdown.abort();
  });

  await server.run(shutdown.signal);
}

main().catch((err: unknown) => {
  console.error(`latency-server: ${coerceErrorString(err)}`);
  process.exitCode = 1;
});
