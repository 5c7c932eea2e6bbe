#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { deriveEscrowAddress, generateSecret, hashSecret } from '@hashlock-swap/escrow-core';
import { logger } from './logger';
import { main as serve } from './node';
import { RequestValidator } from './services/validator';

interface DeriveOptions {
  maker: string;
  resolver: string;
  value: string;
  expiry: string;
  hashlock: string;
  nonce: string;
  role: string;
}

interface HashlockOptions {
  generate?: boolean;
}

export function createCli(): Command {
  const program = new Command();

  program
    .name('hashlock-swap')
    .description('Hash-time-locked escrow node and tooling')
    .version('0.1.0');

  program
    .command('serve')
    .description('Start the escrow node API and deadline monitor')
    .action(async () => {
      logger.info(chalk.blue('🚀 Starting hashlock-swap escrow node'));
      await serve();
    });

  program
    .command('derive')
    .description('Print the escrow address for a set of order data')
    .requiredOption('--maker <address>', 'maker address')
    .requiredOption('--resolver <address>', 'resolver address')
    .requiredOption('--value <amount>', 'escrow value in base units')
    .requiredOption('--expiry <ms>', 'order expiry, milliseconds since epoch')
    .requiredOption('--hashlock <hash>', '32-byte hashlock')
    .option('--nonce <n>', 'creation nonce', '0')
    .option('--role <role>', 'source, destination or fusion', 'source')
    .action((options: DeriveOptions) => {
      const validation = new RequestValidator().validateDerive({
        order: {
          maker: options.maker,
          resolver: options.resolver,
          value: options.value,
          expiry: options.expiry,
          hashlock: options.hashlock,
          nonce: options.nonce
        },
        role: options.role
      });

      if (!validation.valid) {
        for (const error of validation.errors) {
          console.error(chalk.red(`✖ ${error}`));
        }
        process.exitCode = 1;
        return;
      }

      const { order, role } = validation.value;
      console.log(`${chalk.gray(role)} ${chalk.green(deriveEscrowAddress(order, role))}`);
    });

  program
    .command('hashlock')
    .description('Print the hashlock of a secret, or generate a fresh pair')
    .argument('[secret]', '0x hex secret, or text hashed as UTF-8')
    .option('-g, --generate', 'generate a random 32-byte secret')
    .action((secret: string | undefined, options: HashlockOptions) => {
      const value = options.generate ? generateSecret() : secret;

      if (!value) {
        console.error(chalk.red('✖ Provide a secret or pass --generate'));
        process.exitCode = 1;
        return;
      }

      if (options.generate) {
        console.log(`${chalk.gray('secret  ')} ${chalk.yellow(value)}`);
      }
      console.log(`${chalk.gray('hashlock')} ${chalk.green(hashSecret(value))}`);
    });

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error) => {
      logger.error(chalk.red('❌ Command failed:'), error);
      process.exit(1);
    });
}
