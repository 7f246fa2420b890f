import type pg from 'pg';

export const DDL_CREATE_GROUP_TABLE = `
CREATE TABLE IF NOT EXISTS inspection_group (
  id  BIGINT  PRIMARY KEY
)
`.trim();

export const DDL_CREATE_REGION_TABLE = `
CREATE TABLE IF NOT EXISTS inspection_region (
  id        BIGINT            PRIMARY KEY,
  group_id  BIGINT            NOT NULL REFERENCES inspection_group (id),
  coord_x   DOUBLE PRECISION  NOT NULL,
  coord_y   DOUBLE PRECISION  NOT NULL,
  category  INTEGER           NOT NULL
)
`.trim();

export const DDL_CREATE_COORD_INDEX = `
CREATE INDEX IF NOT EXISTS idx_inspection_region_coords
  ON inspection_region (coord_x, coord_y)
`.trim();

// Serves both group membership lookups and the per-group MIN/MAX containment check
export const DDL_CREATE_GROUP_INDEX = `
CREATE INDEX IF NOT EXISTS idx_inspection_region_group
  ON inspection_region (group_id, coord_x, coord_y)
`.trim();

export const DDL_CREATE_CATEGORY_INDEX = `
CREATE INDEX IF NOT EXISTS idx_inspection_region_category
  ON inspection_region (category)
`.trim();

export async function applySchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_GROUP_TABLE);
  await client.query(DDL_CREATE_REGION_TABLE);
  await client.query(DDL_CREATE_COORD_INDEX);
  await client.query(DDL_CREATE_GROUP_INDEX);
  await client.query(DDL_CREATE_CATEGORY_INDEX);
}
