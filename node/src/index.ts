#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig } from './config';
import { BlockchainNode } from './node';
import { createServer } from './server';

async function start() {
  const config = loadConfig();
  const argv = await yargs(hideBin(process.argv))
    .option('port', { alias: 'p', type: 'number', default: config.port, describe: 'port to listen to' })
    .option('host', { type: 'string', default: config.host, describe: 'interface to bind' })
    .option('peers', { type: 'string', array: true, describe: 'peer addresses (host:port)' })
    .strict()
    .parse();

  const node = new BlockchainNode({
    peerTimeoutMs: config.peerTimeoutMs,
    miningBatchSize: config.miningBatchSize,
  });
  node.registerPeers(argv.peers ?? []);

  const { server } = createServer(node);
  server.listen(argv.port, argv.host, () => {
    console.log(`Ledger node ${node.nodeId} listening on ${argv.host}:${argv.port}`);
  });
}

start().catch(e => {
  console.error(e);
  process.exit(1);
});
