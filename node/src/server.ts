import bodyParser from 'body-parser';
import cors from 'cors';
import debug from 'debug';
import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import http from 'http';
import WebSocket, { WebSocketServer } from 'ws';
import { InvalidPeerAddressError, MiningAbortedError } from './errors';
import { BlockchainNode } from './node';
import { nodesFormSchema, transactionFormSchema } from './schema';
import { ChainResponse } from './types';

const log = debug('ledger:server');

export type NodeServer = {
  app: express.Express;
  server: http.Server;
  wss: WebSocketServer;
};

// express 4 does not forward rejected promises to the error handler
function asyncRoute(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function createApp(node: BlockchainNode): express.Express {
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: '2mb' }));
  app.use(bodyParser.urlencoded({ extended: false }));

  app.get('/chain', (req, res) => {
    const chain = node.getChain();
    const body: ChainResponse = { chain, length: chain.length };
    res.json(body);
  });

  app.get(
    '/mine',
    asyncRoute(async (req, res) => {
      const block = await node.mine();
      res.json({
        message: 'New block created',
        block_number: block.block_number,
        transactions: block.transactions,
        nonce: block.nonce,
        previous_hash: block.previous_hash,
      });
    }),
  );

  app.post(
    '/transactions/new',
    asyncRoute(async (req, res) => {
      const parsed = transactionFormSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ message: 'Missing values', errors: parsed.error.flatten().fieldErrors });
        return;
      }
      const form = parsed.data;
      const blockNumber = await node.submitTransaction(
        form.confirmation_sender_public_key,
        form.confirmation_recipient_public_key,
        form.transaction_signature,
        form.confirmation_amount,
      );
      if (blockNumber === false) {
        res.status(406).json({ message: 'Invalid transaction/signature' });
        return;
      }
      res.status(201).json({ message: `Transaction will be added to the Block ${blockNumber}` });
    }),
  );

  app.get('/transactions/get', (req, res) => {
    res.json({ transactions: node.getPendingTransactions() });
  });

  app.post('/nodes/register', (req, res) => {
    const parsed = nodesFormSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ message: 'Error: Please supply a valid nodes list' });
      return;
    }
    node.registerPeers(parsed.data.nodes);
    res.json({ message: 'Nodes have been added', total_nodes: node.getPeers() });
  });

  app.get('/nodes/get', (req, res) => {
    res.json({ nodes: node.getPeers() });
  });

  app.get(
    '/nodes/resolve',
    asyncRoute(async (req, res) => {
      const { replaced, chain } = await node.resolveConsensus();
      if (replaced) {
        res.json({ message: 'Our chain was replaced', new_chain: chain });
      } else {
        res.json({ message: 'Our chain is authoritative', chain });
      }
    }),
  );

  app.get('/health', (req, res) => res.json({ ok: true }));

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof InvalidPeerAddressError) {
      res.status(400).json({ message: err.message });
      return;
    }
    if (err instanceof MiningAbortedError) {
      res.status(409).json({ message: err.message });
      return;
    }
    log('unhandled error on %s %s: %O', req.method, req.path, err);
    res.status(500).json({ message: 'Internal error' });
  });

  return app;
}

/** HTTP server plus a websocket feed of node events. */
export function createServer(node: BlockchainNode): NodeServer {
  const app = createApp(node);
  const server = http.createServer(app);
  const wss = new WebSocketServer({ server });

  wss.on('connection', () => {
    log('ws client connected (%d total)', wss.clients.size);
  });

  function broadcast(type: string, payload: unknown) {
    const msg = JSON.stringify({ type, payload });
    wss.clients.forEach(c => {
      if (c.readyState === WebSocket.OPEN) c.send(msg);
    });
  }

  node.on('transaction', (tx, blockNumber) => broadcast('newTx', { tx, block_number: blockNumber }));
  node.on('block', block => broadcast('newBlock', block));
  node.on('chainReplaced', chain => broadcast('chainReplaced', { length: chain.length }));

  return { app, server, wss };
}
