import type { SchemaSnapshot } from '../../db/types.js';

export function demoSnapshot(overrides: Partial<SchemaSnapshot> = {}): SchemaSnapshot {
  return {
    database: 'demo',
    capturedAt: '2026-01-01T00:00:00.000Z',
    tables: [
      {
        schema: 'public',
        name: 'dim_customer',
        columns: [
          { name: 'id', dataType: 'integer', nullable: false, isPrimaryKey: true },
          { name: 'name', dataType: 'text', nullable: true, isPrimaryKey: false },
        ],
      },
      {
        schema: 'public',
        name: 'fact_loans',
        columns: [
          { name: 'id', dataType: 'bigint', nullable: false, isPrimaryKey: true },
          { name: 'customer_id', dataType: 'integer', nullable: true, isPrimaryKey: false },
        ],
      },
    ],
    views: [
      {
        schema: 'public',
        name: 'v_active',
        columns: [
          { name: 'id', dataType: 'integer', nullable: true, isPrimaryKey: false },
          { name: 'name', dataType: 'text', nullable: true, isPrimaryKey: false },
        ],
      },
    ],
    relationships: [
      {
        constraintName: 'fk_loans_customer',
        fromTable: 'public.fact_loans',
        fromColumn: 'customer_id',
        toTable: 'public.dim_customer',
        toColumn: 'id',
      },
    ],
    ...overrides,
  };
}
