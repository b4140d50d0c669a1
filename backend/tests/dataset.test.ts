import { describe, expect, it } from 'vitest';
import { ONLINE_ORDERS_DATASET, defineDataset, toStagingRecord } from '../src/pipeline/dataset.js';
import { buildInsert, chunk } from '../src/utils/sql.js';

describe('defineDataset', () => {
  const base = {
    sourceFile: 'orders.csv',
    stagingTable: 'orders_staging',
    destinationTable: 'reporting.orders',
    keyColumn: 'id',
  };

  it('accepts a schema-qualified destination', () => {
    const dataset = defineDataset({
      ...base,
      columns: [{ name: 'id', field: 'id', type: 'integer', required: true }],
    });

    expect(dataset.destinationTable).toBe('reporting.orders');
  });

  it('rejects an optional key column', () => {
    expect(() =>
      defineDataset({
        ...base,
        columns: [{ name: 'id', field: 'id', type: 'integer', required: false, default: 0 }],
      })
    ).toThrow('key column id must be required');
  });

  it('rejects an undefined key column', () => {
    expect(() =>
      defineDataset({
        ...base,
        keyColumn: 'order_id',
        columns: [{ name: 'id', field: 'id', type: 'integer', required: true }],
      })
    ).toThrow('key column order_id is not defined');
  });

  it('rejects repeated column names', () => {
    expect(() =>
      defineDataset({
        ...base,
        columns: [
          { name: 'id', field: 'id', type: 'integer', required: true },
          { name: 'id', field: 'ID', type: 'text', required: false },
        ],
      })
    ).toThrow('duplicate column id');
  });
});

describe('ONLINE_ORDERS_DATASET', () => {
  it('keys orders by order number', () => {
    expect(ONLINE_ORDERS_DATASET.keyColumn).toBe('order_number');
    expect(ONLINE_ORDERS_DATASET.columns).toHaveLength(14);
    expect(
      ONLINE_ORDERS_DATASET.columns.filter((column) => column.required).map((column) => column.name)
    ).toEqual(['order_number', 'cost', 'sales']);
  });

  it('maps header names with spaces to column names', () => {
    const record = toStagingRecord(ONLINE_ORDERS_DATASET, {
      Order_Number: '1001',
      'Assigned Supervisor': 'Lee',
    });

    expect(record.order_number).toBe('1001');
    expect(record.assigned_supervisor).toBe('Lee');
    expect(record.brand).toBeNull();
  });
});

describe('buildInsert', () => {
  it('numbers placeholders across rows and nulls missing values', () => {
    const statement = buildInsert('t', ['a', 'b'], [{ a: 1, b: 'x' }, { a: 2 }], 'on conflict (a) do nothing');

    expect(statement).toEqual({
      text: 'insert into t (a, b) values ($1, $2), ($3, $4) on conflict (a) do nothing',
      values: [1, 'x', 2, null],
    });
  });

  it('omits an empty suffix', () => {
    expect(buildInsert('t', ['a'], [{ a: 1 }]).text).toBe('insert into t (a) values ($1)');
  });
});

describe('chunk', () => {
  it('splits into fixed-size batches', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });
});
