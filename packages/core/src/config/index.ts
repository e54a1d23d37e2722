export {
  loadBankConfig,
  InvalidConfigError,
  DEFAULT_BRANCH_NUMBER,
  DEFAULT_DAILY_WITHDRAWAL_LIMIT,
} from './bank-config.js';
export type { BankConfig } from './bank-config.js';
