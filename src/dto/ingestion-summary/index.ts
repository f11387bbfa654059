export * from './ingestion-summary';
