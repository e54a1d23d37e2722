/**
 * Account Service Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AccountService } from '../account-service.js';
import { AccountRepository } from '../account-repository.js';
import { AccountNotFoundError } from '../account-errors.js';
import { CustomerService } from '../../customers/customer-service.js';
import { CustomerRepository } from '../../customers/customer-repository.js';
import { CustomerNotFoundError } from '../../customers/customer-errors.js';
import { BankEventEmitter, type BankEvent } from '../../events/bank-events.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');
const ANA = '52998224725';
const BRUNO = '11144477735';

describe('AccountService', () => {
  let events: BankEventEmitter;
  let emitted: BankEvent[];
  let customers: CustomerService;
  let service: AccountService;

  beforeEach(() => {
    events = new BankEventEmitter({ clock: () => NOW });
    emitted = [];
    events.on((event) => {
      emitted.push(event);
    });
    customers = new CustomerService(new CustomerRepository(), events, { clock: () => NOW });
    customers.createCustomer({ document: ANA, name: 'Ana', birthDate: '1990-01-01', address: 'Rua A' });
    customers.createCustomer({ document: BRUNO, name: 'Bruno', birthDate: '1985-06-15', address: 'Rua B' });
    emitted = [];

    service = new AccountService(new AccountRepository(), customers, events, { clock: () => NOW });
  });

  describe('createAccount', () => {
    it('should open an empty account with the default branch', () => {
      const account = service.createAccount(ANA);

      expect(account).toEqual({
        branch: '0001',
        number: 1,
        customerDocument: ANA,
        createdAt: NOW,
        dailyWithdrawalLimit: 3,
        withdrawalAmountLimitCents: null,
        balanceCents: 0,
        withdrawalsInPeriod: 0,
        periodKey: null,
        history: [],
      });
    });

    it('should number accounts sequentially from 1', () => {
      const numbers = [
        service.createAccount(ANA),
        service.createAccount(BRUNO),
        service.createAccount(ANA),
      ].map((account) => account.number);

      expect(numbers).toEqual([1, 2, 3]);
    });

    it('should accept a masked document', () => {
      const account = service.createAccount('529.982.247-25');

      expect(account.customerDocument).toBe(ANA);
    });

    it('should apply configured branch and limits', () => {
      const custom = new AccountService(new AccountRepository(), customers, events, {
        branch: '0042',
        dailyWithdrawalLimit: 5,
        withdrawalAmountLimit: 1000.5,
      });

      const account = custom.createAccount(ANA);

      expect(account.branch).toBe('0042');
      expect(account.dailyWithdrawalLimit).toBe(5);
      expect(account.withdrawalAmountLimitCents).toBe(100050);
    });

    it('should throw CustomerNotFoundError for an unknown customer', () => {
      expect(() => service.createAccount('12345678909')).toThrow(CustomerNotFoundError);
      expect(service.listAccounts()).toHaveLength(0);
    });

    it('should emit account.opened', () => {
      service.createAccount(ANA);

      expect(emitted).toEqual([
        {
          type: 'account.opened',
          document: ANA,
          branch: '0001',
          accountNumber: 1,
          timestamp: NOW,
        },
      ]);
    });
  });

  describe('constructor', () => {
    it('should reject a non-positive withdrawal amount limit', () => {
      expect(
        () =>
          new AccountService(new AccountRepository(), customers, events, { withdrawalAmountLimit: 0 })
      ).toThrow(RangeError);
    });

    it('should reject a fractional daily limit', () => {
      expect(
        () =>
          new AccountService(new AccountRepository(), customers, events, { dailyWithdrawalLimit: 1.5 })
      ).toThrow('Daily withdrawal limit must be a non-negative integer, got 1.5');
    });
  });

  describe('listAccounts', () => {
    it('should list accounts in creation order', () => {
      service.createAccount(BRUNO);
      service.createAccount(ANA);

      expect(service.listAccounts().map((a) => [a.number, a.customerDocument])).toEqual([
        [1, BRUNO],
        [2, ANA],
      ]);
    });

    it('should hand out accounts callers cannot modify', () => {
      const account = service.createAccount(ANA);
      const accounts = service.listAccounts();

      expect(() => {
        // @ts-expect-error balance is read-only
        account.balanceCents = -500;
      }).toThrow(TypeError);
      expect(() => {
        // @ts-expect-error history is read-only
        account.history.push({ kind: 'deposit', amountCents: 100, timestamp: NOW });
      }).toThrow(TypeError);
      expect(() => {
        // @ts-expect-error the listing is read-only
        accounts.push(account);
      }).toThrow(TypeError);

      const [listed] = service.listAccounts();
      expect(listed?.balanceCents).toBe(0);
      expect(listed?.history).toEqual([]);
      expect(service.listAccounts()).toHaveLength(1);
    });

    it('should return a new snapshot on each call', () => {
      service.createAccount(ANA);
      const first = service.listAccounts();
      service.createAccount(BRUNO);
      const second = service.listAccounts();

      expect(first).toHaveLength(1);
      expect(second).toHaveLength(2);
      expect([...second]).toEqual([...service.listAccounts()]);
    });
  });

  describe('listCustomerAccounts', () => {
    it('should return only the accounts of the customer', () => {
      service.createAccount(ANA);
      service.createAccount(BRUNO);
      service.createAccount(ANA);

      expect(service.listCustomerAccounts(ANA).map((a) => a.number)).toEqual([1, 3]);
      expect(service.listCustomerAccounts(BRUNO).map((a) => a.number)).toEqual([2]);
    });

    it('should return an empty list for a customer without accounts', () => {
      expect(service.listCustomerAccounts(ANA)).toEqual([]);
    });

    it('should throw CustomerNotFoundError for an unknown customer', () => {
      expect(() => service.listCustomerAccounts('12345678909')).toThrow(CustomerNotFoundError);
    });
  });

  describe('findAccount', () => {
    it('should find an account by number', () => {
      const account = service.createAccount(ANA);

      expect(service.findAccount(1)).toBe(account);
    });

    it('should throw AccountNotFoundError for an unknown number', () => {
      expect(() => service.findAccount(7)).toThrow(AccountNotFoundError);
      expect(() => service.findAccount(7)).toThrow('Account not found: 7');
    });
  });

  describe('summarize', () => {
    it('should include the holder name and limits', () => {
      const account = service.createAccount(BRUNO);

      expect(service.summarize(account)).toEqual({
        branch: '0001',
        number: 1,
        holderName: 'Bruno',
        balanceCents: 0,
        withdrawalAmountLimitCents: null,
      });
    });
  });
});
