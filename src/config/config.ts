import convict from 'convict';

export const config = convict<{
  tableName: string;
  columns: string[];
  keyColumns: string[];
  writeMode: string;
}>({
  tableName: {
    doc: 'The asset readings table name',
    format: String,
    default: '',
    env: 'TABLE_NAME',
  },
  columns: {
    doc: 'The csv columns copied onto each table item',
    format: Array,
    default: ['asset_id', 'timestamp', 'value'],
    env: 'CSV_COLUMNS',
  },
  keyColumns: {
    doc: 'The columns which identify a row in the table',
    format: Array,
    default: ['asset_id', 'timestamp'],
    env: 'KEY_COLUMNS',
  },
  writeMode: {
    doc: 'overwrite existing items, or only write items that do not exist yet',
    format: ['overwrite', 'if-not-exists'],
    default: 'overwrite',
    env: 'WRITE_MODE',
  },
}).validate({ allowed: 'strict' });
