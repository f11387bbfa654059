export * from './csv-upload-ingest.adapter';
