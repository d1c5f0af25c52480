import { describe, it, expect } from 'vitest';
import { ledgerFromRow, ledgerToRow } from '../persistence.js';
import { makeLedger } from './fakes.js';

describe('ledger rows', () => {
  it('maps a ledger to snake_case columns and back', () => {
    const ledger = makeLedger({ userId: 'alice', positionQuantity: 1.998, costBasis: 200, currentCapital: 800 });
    const row = ledgerToRow(ledger);

    expect(row.user_id).toBe('alice');
    expect(row.position_quantity).toBe(1.998);
    expect(ledgerFromRow(row)).toEqual(ledger);
  });

  it('accepts numeric columns returned as strings', () => {
    const row = { ...ledgerToRow(makeLedger()), current_capital: '812.5', cost_basis: '0' };

    expect(ledgerFromRow(row).currentCapital).toBe(812.5);
    expect(ledgerFromRow(row).costBasis).toBe(0);
  });

  it('rejects malformed rows', () => {
    expect(() => ledgerFromRow(null)).toThrow('Ledger row is not an object');
    expect(() => ledgerFromRow({ ...ledgerToRow(makeLedger()), current_capital: 'lots' }))
      .toThrow('Column current_capital is not a number');
    expect(() => ledgerFromRow({ ...ledgerToRow(makeLedger()), user_id: 42 }))
      .toThrow('Column user_id is not a string');
  });
});
