#!/usr/bin/env node
/**
 * Wallet helper for clients of a ledger node.
 *
 *   powledger-wallet keygen
 *   powledger-wallet sign --private-key <hex> --recipient <hex> --amount 5
 *
 * `sign` prints the form fields POST /transactions/new expects.
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { generateKeyPair, publicKeyFromPrivate, signTransaction } from '../utils/crypto';

async function main() {
  await yargs(hideBin(process.argv))
    .command('keygen', 'generate a secp256k1 key pair', {}, () => {
      console.log(JSON.stringify(generateKeyPair(), null, 2));
    })
    .command(
      'sign',
      'sign a transaction',
      y =>
        y
          .option('private-key', { type: 'string', demandOption: true })
          .option('recipient', { type: 'string', demandOption: true })
          .option('amount', { type: 'number', demandOption: true }),
      async argv => {
        const sender = publicKeyFromPrivate(argv.privateKey);
        const tx = { sender_public_key: sender, recipient_public_key: argv.recipient, amount: argv.amount };
        const signature = await signTransaction(argv.privateKey, tx);
        console.log(
          JSON.stringify(
            {
              confirmation_sender_public_key: sender,
              confirmation_recipient_public_key: argv.recipient,
              confirmation_amount: argv.amount,
              transaction_signature: signature,
            },
            null,
            2,
          ),
        );
      },
    )
    .demandCommand(1)
    .strict()
    .parse();
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
