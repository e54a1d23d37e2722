#!/usr/bin/env tsx
import dotenv from 'dotenv';
import { BankEventEmitter, createBank, loadBankConfig } from '@simple-bank/core';
import { createLogger } from '@simple-bank/observability';
import { initializeAuditLogging } from './audit-logger.js';
import { createMoneyFormatter } from './format.js';
import { BankMenu } from './menu.js';
import { createReadlinePrompter } from './prompter.js';

async function main(): Promise<void> {
  dotenv.config();

  const config = loadBankConfig();
  // Logs go to stderr so they never interleave with the menu
  const logger = createLogger({ level: config.logLevel }, process.stderr);

  const events = new BankEventEmitter({
    onHandlerError: (error, event) => {
      logger.error({ err: error, event: event.type }, 'Bank event handler failed');
    },
  });
  const bank = createBank({ config, events });
  initializeAuditLogging(bank.events, logger);

  const prompter = createReadlinePrompter();
  const menu = new BankMenu({
    bank,
    prompter,
    output: (text) => {
      process.stdout.write(`${text}\n`);
    },
    money: createMoneyFormatter(config.locale, config.currency),
    logger,
  });

  try {
    await menu.run();
  } finally {
    prompter.close();
  }
}

main().catch((error: unknown) => {
  console.error('Bank terminal failed:', error);
  process.exit(1);
});
