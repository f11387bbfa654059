export * from './ingest-csv-upload';
export * from './row-to-item';
