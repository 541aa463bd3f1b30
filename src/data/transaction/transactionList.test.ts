import { describe, it, expect } from 'vitest';
import { TransactionList, UNCATEGORIZED } from './transactionList';
import { Transaction } from './transaction';
import { createTransaction } from '../../utils/test/mockData';

describe('TransactionList', () => {
  const joshGroceries = createTransaction({ name: 'Market', amount: 40, account: 'Josh' });
  const annaDining = createTransaction({
    name: 'Bistro',
    amount: 30,
    category: 'Dining',
    criticality: 'Non Essential',
    account: 'Anna',
    paymentMethod: 'Amex',
  });
  const jointGroceries = createTransaction({ name: 'Costco', amount: 120, account: 'Joint' });
  const savings = createTransaction({ name: 'Transfer', amount: 200, category: '', account: 'Savings' });
  const all = [joshGroceries, annaDining, jointGroceries, savings];

  describe('constructor', () => {
    it('should copy the input so later changes do not affect it', () => {
      const input = [joshGroceries];
      const list = new TransactionList(input, 'Test');
      input.push(annaDining);

      expect(list.getTotalCount()).toBe(1);
      expect(list.getTotalAmount()).toBe(40);
    });

    it('should accept a missing list', () => {
      const list = new TransactionList(null);

      expect(list.getTotalCount()).toBe(0);
      expect(list.getTotalAmount()).toBe(0);
      expect(list.getDescription()).toBe('');
    });
  });

  describe('field filters', () => {
    it('should match case-insensitively after trimming', () => {
      const list = new TransactionList(all, 'All');

      expect(list.filterByName('  market ').getTransactions()).toEqual([joshGroceries]);
    });

    it('should describe the filter', () => {
      const list = new TransactionList(all, 'All');

      expect(list.filterByCategory('Groceries').getDescription()).toBe('All (Filtered: Category=Groceries)');
      expect(list.filterByCategory('Groceries', 'Josh').getDescription()).toBe(
        'All (Filtered: Category=Groceries, Account=Josh)',
      );
    });

    it('should match the criticality', () => {
      const list = new TransactionList(all);

      expect(list.filterByCriticality('NonEssential').getTransactions()).toEqual([annaDining]);
    });

    it('should match a criticality written with spaces', () => {
      const list = new TransactionList(all);

      expect(list.filterByCriticality('Non Essential').getTransactions()).toEqual([annaDining]);
      expect(list.filter('Criticality', ' non  essential ').getTransactions()).toEqual([annaDining]);
    });

    it('should match formatted and plain amounts', () => {
      const list = new TransactionList(all);

      expect(list.filterByAmount('$120.00').getTransactions()).toEqual([jointGroceries]);
      expect(list.filterByAmount('120').getTransactions()).toEqual([jointGroceries]);
      expect(list.filterByAmount('121').getTotalCount()).toBe(0);
    });

    it('should include half of Joint transactions when filtering for a person', () => {
      const list = new TransactionList(all);
      const result = list.filterByCategory('Groceries', 'Josh').getTransactions();

      expect(result.map((tx) => [tx.name, tx.amount, tx.account])).toEqual([
        ['Market', 40, 'Josh'],
        ['Costco [Split Joint]', 60, 'Josh'],
      ]);
    });

    it('should match the payment method', () => {
      const list = new TransactionList(all);

      expect(list.filterByPaymentMethod('amex').getTransactions()).toEqual([annaDining]);
    });
  });

  describe('filterByAccount', () => {
    it('should split Joint transactions for an individual', () => {
      const result = new TransactionList(all).filterByAccount('anna');

      expect(result.getTotalAmount()).toBe(90);
      expect(result.getDescription()).toBe('(Filtered: Account=anna)');
    });

    it('should match other accounts exactly', () => {
      const result = new TransactionList(all).filterByAccount('joint');

      expect(result.getTransactions()).toEqual([jointGroceries]);
    });

    it('should keep the halves summing to the Joint amount', () => {
      const list = new TransactionList([jointGroceries]);

      expect(list.filterByAccount('Josh').getTotalAmount() + list.filterByAccount('Anna').getTotalAmount()).toBe(120);
    });
  });

  describe('filter', () => {
    it('should dispatch by column name ignoring case', () => {
      const list = new TransactionList(all);

      expect(list.filter('category', 'Dining').getTransactions()).toEqual([annaDining]);
      expect(list.filter('Amount', '40').getTransactions()).toEqual([joshGroceries]);
      expect(list.filter('ACCOUNT', 'Savings').getTransactions()).toEqual([savings]);
    });

    it('should throw for an unknown column', () => {
      expect(() => new TransactionList(all).filter('Color', 'Red')).toThrow("Unknown column 'Color'");
    });
  });

  describe('getPersonalizedTransactions', () => {
    it('should return own and split Joint transactions', () => {
      const result = new TransactionList(all).getPersonalizedTransactions('Josh');

      expect(result.map((tx) => tx.amount)).toEqual([40, 60]);
    });

    it('should filter by criticality when given', () => {
      const result = new TransactionList(all).getPersonalizedTransactions('Anna', 'NonEssential');

      expect(result).toEqual([annaDining]);
    });

    it('should accept a criticality written with spaces', () => {
      const result = new TransactionList(all).getPersonalizedTransactions('Anna', 'Non Essential');

      expect(result).toEqual([annaDining]);
    });

    it('should return nothing for a non-individual', () => {
      expect(new TransactionList(all).getPersonalizedTransactions('Joint')).toEqual([]);
    });
  });

  describe('getCategoryTotals', () => {
    it('should total the categories of an account and criticality', () => {
      const totals = new TransactionList(all).getCategoryTotals('Josh', 'Essential');

      expect([...totals.entries()]).toEqual([['Groceries', 100]]);
    });

    it('should group blank categories as uncategorized', () => {
      const totals = new TransactionList(all).getCategoryTotals('Savings', 'Essential');

      expect(totals.get(UNCATEGORIZED)).toBe(200);
    });

    it('should not invent categories', () => {
      const totals = new TransactionList(all).getCategoryTotals('Anna', 'Essential');

      expect(totals.has('Dining')).toBe(false);
    });
  });

  describe('byCategory', () => {
    it('should group transactions by category', () => {
      const groups = new TransactionList(all).byCategory();

      expect(groups.get('Groceries')).toEqual([joshGroceries, jointGroceries]);
      expect(groups.get(UNCATEGORIZED)).toEqual([savings]);
    });

    it('should not let callers change the grouping', () => {
      const list = new TransactionList(all);
      const groups = list.byCategory();
      groups.get('Groceries')?.push(annaDining);
      groups.delete(UNCATEGORIZED);

      const again = list.byCategory();
      expect(again.get('Groceries')).toEqual([joshGroceries, jointGroceries]);
      expect(again.get(UNCATEGORIZED)).toEqual([savings]);
    });
  });

  it('should hold Transaction instances', () => {
    expect(new TransactionList(all).getTransactions()[0]).toBeInstanceOf(Transaction);
  });
});
