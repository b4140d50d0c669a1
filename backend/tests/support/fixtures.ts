import pino from 'pino';
import { defineDataset } from '../../src/pipeline/dataset.js';

export const silentLogger = pino({ level: 'silent' });

/** Minimal order schema: `id` is the natural key, `qty` a required number. */
export const ORDERS = defineDataset({
  sourceFile: 'orders.csv',
  stagingTable: 'orders_staging',
  destinationTable: 'orders',
  keyColumn: 'id',
  columns: [
    { name: 'id', field: 'id', type: 'integer', required: true },
    { name: 'qty', field: 'qty', type: 'numeric', required: true },
  ],
});

export const ORDERS_WITH_OPTIONALS = defineDataset({
  sourceFile: 'orders.csv',
  stagingTable: 'orders_staging',
  destinationTable: 'orders',
  keyColumn: 'id',
  columns: [
    { name: 'id', field: 'id', type: 'integer', required: true },
    { name: 'qty', field: 'qty', type: 'numeric', required: true },
    { name: 'placed', field: 'placed', type: 'date', required: false, default: null },
    { name: 'channel', field: 'channel', type: 'text', required: false, default: 'Unknown' },
    { name: 'discount', field: 'discount', type: 'numeric', required: false, default: 0 },
  ],
});
