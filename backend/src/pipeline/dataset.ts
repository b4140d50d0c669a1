import { z } from 'zod';

export type ColumnType = 'text' | 'numeric' | 'integer' | 'date';

/** Value of a cleaned column: text and dates as strings, numbers as numbers. */
export type CleanValue = string | number | null;

const identifier = /^[a-z_][a-z0-9_]*$/;
const tableName = /^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)?$/;

const columnSchema = z.object({
  name: z.string().regex(identifier, 'column names must be lower-case sql identifiers'),
  field: z.string().min(1),
  type: z.enum(['text', 'numeric', 'integer', 'date']),
  required: z.boolean(),
  default: z.union([z.string(), z.number(), z.null()]).optional(),
});

export type ColumnDefinition = z.infer<typeof columnSchema>;

export const datasetSchema = z
  .object({
    sourceFile: z.string().min(1),
    stagingTable: z.string().regex(tableName),
    destinationTable: z.string().regex(tableName),
    keyColumn: z.string().min(1),
    columns: z.array(columnSchema).min(1),
  })
  .superRefine((dataset, ctx) => {
    const names = new Set<string>();
    for (const column of dataset.columns) {
      if (names.has(column.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate column ${column.name}` });
      }
      names.add(column.name);
    }
    const key = dataset.columns.find((column) => column.name === dataset.keyColumn);
    if (!key) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `key column ${dataset.keyColumn} is not defined` });
    } else if (!key.required) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `key column ${dataset.keyColumn} must be required` });
    }
  });

/**
 * Column contract shared by every step: CSV header (`field`), database
 * column (`name`), target type and missing-value policy.
 */
export type DatasetDefinition = z.infer<typeof datasetSchema>;

export function defineDataset(definition: DatasetDefinition): DatasetDefinition {
  return datasetSchema.parse(definition);
}

export const ONLINE_ORDERS_DATASET: DatasetDefinition = defineDataset({
  sourceFile: 'Online-eCommerce.csv',
  stagingTable: 'online_order_staging',
  destinationTable: 'online_order',
  keyColumn: 'order_number',
  columns: [
    { name: 'order_number', field: 'Order_Number', type: 'integer', required: true },
    { name: 'state_code', field: 'State_Code', type: 'text', required: false, default: 'Unknown' },
    { name: 'customer_name', field: 'Customer_Name', type: 'text', required: false, default: 'Unknown' },
    { name: 'order_date', field: 'Order_Date', type: 'date', required: false, default: null },
    { name: 'status', field: 'Status', type: 'text', required: false, default: 'Unknown' },
    { name: 'product', field: 'Product', type: 'text', required: false, default: 'Unknown' },
    { name: 'category', field: 'Category', type: 'text', required: false, default: 'Unknown' },
    { name: 'brand', field: 'Brand', type: 'text', required: false, default: 'Unknown' },
    { name: 'cost', field: 'Cost', type: 'numeric', required: true },
    { name: 'sales', field: 'Sales', type: 'numeric', required: true },
    { name: 'quantity', field: 'Quantity', type: 'numeric', required: false, default: 0 },
    { name: 'total_cost', field: 'Total_Cost', type: 'numeric', required: false, default: 0 },
    { name: 'total_sales', field: 'Total_Sales', type: 'numeric', required: false, default: 0 },
    { name: 'assigned_supervisor', field: 'Assigned Supervisor', type: 'text', required: false, default: 'Unknown' },
  ],
});

/** Source record as read from the file, keyed by CSV header. */
export type RawRow = Record<string, string | null>;

/** Raw row keyed by database column; every value is still text. */
export type StagingRecord = Record<string, string | null>;

export type CleanedRecord = Record<string, CleanValue>;

export const rawRowSchema = z.record(z.string(), z.string().nullable());
export const cleanedRecordSchema = z.record(z.string(), z.union([z.string(), z.number(), z.null()]));

export function toStagingRecord(dataset: DatasetDefinition, row: RawRow): StagingRecord {
  const record: StagingRecord = {};
  for (const column of dataset.columns) {
    record[column.name] = row[column.field] ?? null;
  }
  return record;
}
